/**
 * linelog - 类型定义
 *
 * 七个级别（normal/info/success/warning/error/debug/critical），全部输出不做过滤；
 * 双输出（控制台彩色 + 按日期分文件）。
 */

import type { CalendarDate } from "../time/zoned.js";

export type Severity = "normal" | "info" | "success" | "warning" | "error" | "debug" | "critical";

export const SEVERITIES: readonly Severity[] = [
  "normal",
  "info",
  "success",
  "warning",
  "error",
  "debug",
  "critical",
];

/** 有独立 tag 的级别；normal 复用 info 的 tag */
export type TaggedSeverity = Exclude<Severity, "normal">;

export type SeverityTags = Readonly<Record<TaggedSeverity, string>>;

export type FileEncoding = "utf-8" | "utf8" | "latin1" | "ascii" | "utf16le";

/** 无法编码字符的处理方式 */
export type EncodingErrors = "strict" | "replace" | "ignore";

/**
 * 写盘粒度
 * - line：每次 append 直接写入内核
 * - durable：每次 append 后再 fsync
 */
export type FileBuffering = "line" | "durable";

/** 文件行状态：下一次写入是否需要新的 `[时间] TAG ` 前缀 */
export type LineMode = "fresh" | "mid-line";

/** ANSI 颜色表，未知 key 一律返回空串 */
export class ColorTable {
  private readonly codes: ReadonlyMap<string, string>;

  constructor(codes: Readonly<Record<string, string>>) {
    this.codes = new Map(Object.entries(codes));
  }

  get(key: string): string {
    return this.codes.get(key) ?? "";
  }

  /** 导出为普通对象（测试与调试用） */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.codes);
  }
}

/** 最小控制台流接口，process.stdout / process.stderr 均满足 */
export interface ConsoleStream {
  write(chunk: string): unknown;
  flush?(): void;
  destroyed?: boolean;
  writableEnded?: boolean;
}

/** 构造完成后只读 */
export interface Policy {
  readonly logsDir: string;
  readonly timeZone: string;
  readonly retentionDays: number;

  readonly logToFile: boolean;
  readonly fileEncoding: FileEncoding;
  readonly fileEncodingErrors: EncodingErrors;
  readonly fileBuffering: FileBuffering;

  readonly logToConsole: boolean;
  readonly useConsoleColors: boolean;
  readonly captureStderr: boolean;

  readonly filenameFormat: string;
  readonly timestampFormat: string;
  /** 是否使用了自定义 filenameForDate（影响过期清理的匹配范围） */
  readonly customFilename: boolean;
  filenameForDate(date: CalendarDate): string;

  readonly tags: SeverityTags;
  readonly colors: ColorTable;
}

export function tagFor(policy: Policy, severity: Severity): string {
  return severity === "normal" ? policy.tags.info : policy.tags[severity];
}
