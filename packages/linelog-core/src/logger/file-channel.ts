/**
 * linelog - 按日期轮转的日志文件
 *
 * 功能：
 * - 每个自然日（按 Policy 时区）一个文件，每次写入前检查是否跨天
 * - 以 "\r" 开头的文本覆盖上一条记录（进度条效果）
 * - 每个新逻辑行注入 `[时间] TAG ` 前缀
 * - 打开 / 写入失败不抛出，降级为丢弃
 */

import fs from "node:fs";
import { strftime } from "../time/strftime.js";
import { calendarDate, zonedTime } from "../time/zoned.js";
import { encodeText } from "./encoding.js";
import { formatLines } from "./line-format.js";
import type { LineMode, Policy } from "./types.js";

/** 当前打开的文件，同一时刻最多一个 */
export interface OpenFileState {
  /** 打开时对应的日期 "YYYY-MM-DD" */
  date: string;
  path: string;
  fd: number;
  /** 普通文件才能截断；字符设备、管道等不支持覆盖 */
  seekable: boolean;
  /** 最后一条记录（最后一个前缀）的字节偏移 */
  lastEntryOffset: number;
  mode: LineMode;
}

export interface RotatingFileChannelOptions {
  /** 时钟，测试时注入 */
  now?: () => Date;
  /** 打开失败等诊断信息的去向 */
  onWarning?: (message: string) => void;
}

export class RotatingFileChannel {
  private state: OpenFileState | null = null;
  private failedPath: string | null = null;
  private readonly now: () => Date;
  private readonly onWarning: (message: string) => void;

  constructor(
    private readonly policy: Policy,
    opts: RotatingFileChannelOptions = {}
  ) {
    this.now = opts.now ?? (() => new Date());
    this.onWarning = opts.onWarning ?? (() => undefined);
  }

  /** 当前文件路径，未打开时为 null */
  get currentPath(): string | null {
    return this.state?.path ?? null;
  }

  get isOpen(): boolean {
    return this.state !== null;
  }

  /**
   * 确保打开的是"今天"的文件。
   * force 为 true 时无条件重新打开（启动时使用）。
   */
  ensureCurrent(force = false): boolean {
    return this.current(force) !== null;
  }

  append(text: string, tag: string): void {
    if (!text) return;
    const state = this.current(false);
    if (!state) return;

    try {
      let eof = state.seekable ? fs.fstatSync(state.fd).size : 0;
      let body = text;

      if (body.startsWith("\r") && state.seekable) {
        try {
          const offset = Math.min(state.lastEntryOffset, eof);
          fs.ftruncateSync(state.fd, offset);
          eof = offset;
          body = body.replace(/^\r+/, "");
          state.mode = "fresh";
        } catch {
          // 截断失败：按普通追加处理
        }
      }

      const ts = strftime(this.policy.timestampFormat, zonedTime(this.now(), this.policy.timeZone));
      const formatted = formatLines(body, tag, ts, state.mode);
      const { fileEncoding, fileEncodingErrors } = this.policy;
      const bytes = encodeText(formatted.output, fileEncoding, fileEncodingErrors);

      let written = 0;
      while (written < bytes.length) {
        const n = fs.writeSync(state.fd, bytes, written, bytes.length - written);
        if (n <= 0) break;
        written += n;
      }
      if (this.policy.fileBuffering === "durable") {
        fs.fsyncSync(state.fd);
      }

      if (formatted.lastPreambleAt !== null) {
        const head = formatted.output.slice(0, formatted.lastPreambleAt);
        state.lastEntryOffset = eof + encodeText(head, fileEncoding, fileEncodingErrors).length;
      }
      state.mode = formatted.mode;
    } catch {
      // 写入失败：丢弃本条
    }
  }

  close(): void {
    if (!this.state) return;
    const { fd } = this.state;
    this.state = null;
    try {
      fs.closeSync(fd);
    } catch {
      // 忽略关闭错误
    }
  }

  private current(force: boolean): OpenFileState | null {
    const today = calendarDate(this.now(), this.policy.timeZone);
    if (!force && this.state && this.state.date === today.key) {
      return this.state;
    }

    this.close();

    let filePath: string;
    try {
      filePath = this.policy.filenameForDate(today);
    } catch (err) {
      this.warnOnce(`<filename for ${today.key}>`, err);
      return null;
    }

    try {
      const fd = fs.openSync(filePath, "a");
      let size = 0;
      let seekable = false;
      try {
        const stat = fs.fstatSync(fd);
        seekable = stat.isFile();
        size = seekable ? stat.size : 0;
      } catch {
        // 取不到大小时当作不可截断的流
      }
      this.state = { date: today.key, path: filePath, fd, seekable, lastEntryOffset: size, mode: "fresh" };
      this.failedPath = null;
      return this.state;
    } catch (err) {
      this.warnOnce(filePath, err);
      return null;
    }
  }

  /** 同一路径连续失败只提示一次 */
  private warnOnce(filePath: string, err: unknown): void {
    if (this.failedPath === filePath) return;
    this.failedPath = filePath;
    const reason = err instanceof Error ? err.message : String(err);
    try {
      this.onWarning(`[linelog] Failed to open log file ${filePath}: ${reason}\n`);
    } catch {
      // 诊断输出本身失败时不再处理
    }
  }
}
