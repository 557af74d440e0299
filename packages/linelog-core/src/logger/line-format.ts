/**
 * linelog - 行格式化
 */

import type { LineMode } from "./types.js";

export interface FormattedLines {
  /** 需要追加到文件的完整文本 */
  output: string;
  /** output 中最后一个前缀的起始下标；没有写前缀时为 null */
  lastPreambleAt: number | null;
  /** 写完之后的行状态 */
  mode: LineMode;
}

export function preamble(timestamp: string, tag: string): string {
  return `[${timestamp}] ${tag} `;
}

/**
 * 把一段原始文本转换成写入文件的内容。
 *
 * 每个新逻辑行前面加 `[时间] TAG `；上一段没以换行结束时（mid-line），
 * 本段第一行直接续写，不加前缀。
 */
export function formatLines(text: string, tag: string, timestamp: string, mode: LineMode): FormattedLines {
  const parts = text.split("\n");
  const trailingNewline = text.endsWith("\n");
  const last = parts.length - 1;

  let output = "";
  let lastPreambleAt: number | null = null;
  let state = mode;

  for (let i = 0; i < parts.length; i++) {
    // "a\n".split("\n") 末尾的空串不是新行
    if (i === last && trailingNewline) break;

    if (state === "fresh") {
      lastPreambleAt = output.length;
      output += preamble(timestamp, tag);
      state = "mid-line";
    }
    output += parts[i];
    if (i < last) {
      output += "\n";
      state = "fresh";
    }
  }

  return { output, lastPreambleAt, mode: state };
}
