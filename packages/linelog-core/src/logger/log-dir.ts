/**
 * linelog - 日志目录准备
 *
 * 启动时创建目录，并删除修改日期早于 retentionDays 的旧日志。
 * 在 Printer 打开第一个文件之前调用。
 */

import fs from "node:fs";
import path from "node:path";
import { strftimePattern } from "../time/strftime.js";
import { addDays, calendarDate, epochDay } from "../time/zoned.js";
import type { ConsoleStream, Policy } from "./types.js";

export interface PrepareLogDirOptions {
  now?: () => Date;
  /** 目录创建失败时的提示去向 */
  stderr?: ConsoleStream;
}

/** 清理过期日志，返回被删除的文件名 */
export function cleanupOldLogs(policy: Policy, now: Date = new Date()): string[] {
  const removed: string[] = [];
  const cutoff = epochDay(addDays(calendarDate(now, policy.timeZone), -policy.retentionDays));
  // 自定义文件名时无法推断命名规则，目录下所有文件都参与清理
  const pattern = policy.customFilename ? null : strftimePattern(path.basename(policy.filenameFormat));

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(policy.logsDir, { withFileTypes: true });
  } catch {
    return removed;
  }

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (pattern && !pattern.test(entry.name)) continue;
    const fp = path.join(policy.logsDir, entry.name);
    try {
      const stat = fs.statSync(fp);
      const fileDay = epochDay(calendarDate(stat.mtime, policy.timeZone));
      if (fileDay < cutoff) {
        fs.unlinkSync(fp);
        removed.push(entry.name);
      }
    } catch {
      // 忽略单个文件错误
    }
  }
  return removed;
}

/**
 * 创建日志目录并清理过期文件。未开启文件输出时什么都不做。
 * 返回目录是否可用。
 */
export function prepareLogDirectory(policy: Policy, opts: PrepareLogDirOptions = {}): boolean {
  if (!policy.logToFile) return false;
  try {
    fs.mkdirSync(policy.logsDir, { recursive: true });
  } catch {
    const stderr = opts.stderr ?? process.stderr;
    try {
      stderr.write(`Warning: Could not create logs directory '${policy.logsDir}'.\n`);
    } catch {
      // 提示失败时忽略
    }
    return false;
  }
  cleanupOldLogs(policy, (opts.now ?? (() => new Date()))());
  return true;
}
