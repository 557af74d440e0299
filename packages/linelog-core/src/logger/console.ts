/**
 * linelog - 控制台输出
 *
 * 彩色输出只作用于控制台，文件里永远是纯文本。
 */

import type { ColorTable, ConsoleStream, Severity } from "./types.js";

/**
 * 给消息包上颜色。以 "\r" 开头时把 "\r" 放到颜色码前面，
 * 终端才会先回到行首再着色。
 */
export function colorize(colors: ColorTable, severity: Severity, message: string): string {
  const color = colors.get(severity);
  const reset = colors.get("reset");
  if (message.startsWith("\r")) {
    return `\r${color}${message.slice(1)}${reset}`;
  }
  return `${color}${message}${reset}`;
}

function isClosed(stream: ConsoleStream): boolean {
  return stream.destroyed === true || stream.writableEnded === true;
}

/** 尽力写入控制台：流已关闭或写入抛错时静默丢弃 */
export function writeConsole(stream: ConsoleStream, text: string, flush: boolean): void {
  if (isClosed(stream)) return;
  try {
    stream.write(text);
    if (flush) stream.flush?.();
  } catch {
    // 控制台输出是尽力而为
  }
}
