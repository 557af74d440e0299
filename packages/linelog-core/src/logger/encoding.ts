/**
 * linelog - 日志文件编码
 */

import type { EncodingErrors, FileEncoding } from "./types.js";

export class EncodingError extends Error {
  constructor(codePoint: number, encoding: FileEncoding) {
    super(`Cannot encode U+${codePoint.toString(16).toUpperCase().padStart(4, "0")} as ${encoding}`);
    this.name = "EncodingError";
  }
}

function toBufferEncoding(encoding: FileEncoding): BufferEncoding {
  return encoding === "utf-8" ? "utf8" : encoding;
}

function isLoneSurrogate(cp: number): boolean {
  return cp >= 0xd800 && cp <= 0xdfff;
}

/** 单个码点能否用该编码表示 */
function encodable(cp: number, encoding: FileEncoding): boolean {
  switch (encoding) {
    case "ascii":
      return cp <= 0x7f;
    case "latin1":
      return cp <= 0xff;
    default:
      return !isLoneSurrogate(cp);
  }
}

function replacementFor(encoding: FileEncoding): string {
  return encoding === "ascii" || encoding === "latin1" ? "?" : "\ufffd";
}

/**
 * 按编码与错误策略把文本转成字节。
 * strict 遇到无法编码的字符抛 EncodingError；replace 替换为 U+FFFD 或 "?"；ignore 直接丢弃。
 */
export function encodeText(text: string, encoding: FileEncoding, errors: EncodingErrors): Buffer {
  let clean = text;
  // 快速路径：纯 ASCII 任何编码都能表示
  if (/[^\x00-\x7f]/.test(text)) {
    clean = "";
    for (const ch of text) {
      const cp = ch.codePointAt(0) ?? 0;
      if (encodable(cp, encoding)) {
        clean += ch;
      } else if (errors === "strict") {
        throw new EncodingError(cp, encoding);
      } else if (errors === "replace") {
        clean += replacementFor(encoding);
      }
    }
  }
  return Buffer.from(clean, toBufferEncoding(encoding));
}
