/**
 * linelog - Policy 构造与校验
 *
 * 所有选项经 zod 校验并补默认值，结果冻结后交给 Printer 使用。
 */

import path from "node:path";
import { z } from "zod";
import { strftime } from "../time/strftime.js";
import { isValidTimeZone, resolveTimeZone, startOfDay, type CalendarDate } from "../time/zoned.js";
import { ColorTable, type Policy } from "./types.js";

export const DEFAULT_COLORS: Readonly<Record<string, string>> = {
  normal: "\x1b[37m",
  info: "\x1b[34m",
  error: "\x1b[31m",
  warning: "\x1b[33m",
  success: "\x1b[32m",
  debug: "\x1b[36m",
  critical: "\x1b[41m\x1b[37m",
  reset: "\x1b[0m",
};

const TagsSchema = z.object({
  info: z.string().default("[INFO]"),
  error: z.string().default("[ERROR]"),
  warning: z.string().default("[WARN]"),
  success: z.string().default("[SUCCESS]"),
  debug: z.string().default("[DEBUG]"),
  critical: z.string().default("[CRIT]"),
});

export const PolicySchema = z.object({
  logsDir: z.string().min(1, "日志目录不能为空").default("logs"),
  timeZone: z
    .string()
    .default("UTC")
    .transform(resolveTimeZone)
    .refine(isValidTimeZone, { message: "未知时区" }),
  retentionDays: z.number().int().min(0).default(7),

  logToFile: z.boolean().default(true),
  fileEncoding: z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]).default("utf-8"),
  fileEncodingErrors: z.enum(["strict", "replace", "ignore"]).default("replace"),
  fileBuffering: z.enum(["line", "durable"]).default("line"),

  logToConsole: z.boolean().default(true),
  useConsoleColors: z.boolean().default(true),
  captureStderr: z.boolean().default(true),

  filenameFormat: z.string().min(1, "文件名格式不能为空").default("log_%Y-%m-%d.txt"),
  timestampFormat: z.string().default("%H:%M:%S"),

  tags: TagsSchema.default({}),
  /** 覆盖默认颜色表（按 key 合并） */
  colors: z.record(z.string()).optional(),
});

export type PolicyOptions = z.input<typeof PolicySchema> & {
  /** 自定义日期 → 文件路径；不传时按 logsDir + filenameFormat 生成 */
  filenameForDate?: (date: CalendarDate) => string;
};

export class PolicyError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid linelog policy: ${issues.join("; ")}`);
    this.name = "PolicyError";
    this.issues = issues;
  }
}

export function createPolicy(options: PolicyOptions = {}): Policy {
  const { filenameForDate: custom, ...rest } = options;
  const result = PolicySchema.safeParse(rest);
  if (!result.success) {
    throw new PolicyError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  const parsed = result.data;

  const filenameForDate =
    custom ?? ((date: CalendarDate) => path.join(parsed.logsDir, strftime(parsed.filenameFormat, startOfDay(date, parsed.timeZone))));

  const policy: Policy = {
    logsDir: parsed.logsDir,
    timeZone: parsed.timeZone,
    retentionDays: parsed.retentionDays,
    logToFile: parsed.logToFile,
    fileEncoding: parsed.fileEncoding,
    fileEncodingErrors: parsed.fileEncodingErrors,
    fileBuffering: parsed.fileBuffering,
    logToConsole: parsed.logToConsole,
    useConsoleColors: parsed.useConsoleColors,
    captureStderr: parsed.captureStderr,
    filenameFormat: parsed.filenameFormat,
    timestampFormat: parsed.timestampFormat,
    customFilename: custom !== undefined,
    filenameForDate,
    tags: Object.freeze({ ...parsed.tags }),
    colors: new ColorTable({ ...DEFAULT_COLORS, ...parsed.colors }),
  };
  return Object.freeze(policy);
}
