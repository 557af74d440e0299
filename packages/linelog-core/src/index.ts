/**
 * linelog
 *
 * print 风格的日志门面：
 * - 控制台彩色输出 + 按日期分文件
 * - "\r" 开头覆盖上一条记录（进度显示）
 * - 接管 stderr，按行写入日志文件
 */

export { openPrintSession, openPrintSessionFromEnv, type PrintSession, type PrintSessionHost } from "./session.js";
export { Printer, stringify, type EmitOptions, type PrinterOptions } from "./logger/printer.js";
export { createPrint, type PrintFunction, type BoundPrint, type SeverityMethods } from "./logger/print.js";
export { RotatingFileChannel, type OpenFileState, type RotatingFileChannelOptions } from "./logger/file-channel.js";
export { formatLines, preamble, type FormattedLines } from "./logger/line-format.js";
export {
  ErrorStreamCapture,
  monitorUncaughtExceptions,
  type InstalledCapture,
  type InterceptableStream,
  type RawErrorStream,
  type UncaughtExceptionSource,
} from "./logger/stderr-capture.js";
export { createPolicy, PolicyError, PolicySchema, DEFAULT_COLORS, type PolicyOptions } from "./logger/policy.js";
export { loadPolicyFromEnv, loadPolicyOptionsFromEnv } from "./logger/env.js";
export { prepareLogDirectory, cleanupOldLogs, type PrepareLogDirOptions } from "./logger/log-dir.js";
export { encodeText, EncodingError } from "./logger/encoding.js";
export { SyncLock } from "./logger/lock.js";
export { colorize } from "./logger/console.js";
export {
  ColorTable,
  SEVERITIES,
  tagFor,
  type ConsoleStream,
  type EncodingErrors,
  type FileBuffering,
  type FileEncoding,
  type LineMode,
  type Policy,
  type Severity,
  type SeverityTags,
  type TaggedSeverity,
} from "./logger/types.js";
export { strftime, strftimePattern } from "./time/strftime.js";
export { calendarDate, zonedTime, type CalendarDate, type ZonedTime } from "./time/zoned.js";
