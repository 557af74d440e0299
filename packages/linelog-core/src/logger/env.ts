/**
 * linelog - 环境变量配置
 *
 * LINELOG_* 变量映射到 Policy 选项，未设置或无法解析的字段沿用默认值。
 */

import { createPolicy, type PolicyOptions } from "./policy.js";
import type { Policy } from "./types.js";

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const v = readEnv(env, name);
  if (v === undefined) return undefined;
  return v.toLowerCase() !== "false" && v !== "0";
}

/** 从环境变量读取 Policy 选项（未设置的字段交给 createPolicy 的默认值） */
export function loadPolicyOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): PolicyOptions {
  const options: PolicyOptions = {};

  const dir = readEnv(env, "LINELOG_DIR");
  if (dir) options.logsDir = dir;
  const tz = readEnv(env, "LINELOG_TIMEZONE");
  if (tz) options.timeZone = tz;

  const retention = readEnv(env, "LINELOG_RETENTION_DAYS");
  if (retention !== undefined) {
    const n = Number(retention);
    if (Number.isInteger(n) && n >= 0) options.retentionDays = n;
  }

  options.logToFile = readFlag(env, "LINELOG_FILE");
  options.logToConsole = readFlag(env, "LINELOG_CONSOLE");
  options.useConsoleColors = readFlag(env, "LINELOG_COLORS");
  options.captureStderr = readFlag(env, "LINELOG_CAPTURE_STDERR");

  const filenameFormat = readEnv(env, "LINELOG_FILENAME_FORMAT");
  if (filenameFormat) options.filenameFormat = filenameFormat;
  const timestampFormat = readEnv(env, "LINELOG_TIMESTAMP_FORMAT");
  if (timestampFormat) options.timestampFormat = timestampFormat;

  const encoding = readEnv(env, "LINELOG_ENCODING");
  if (encoding === "utf-8" || encoding === "utf8" || encoding === "latin1" || encoding === "ascii" || encoding === "utf16le") {
    options.fileEncoding = encoding;
  }
  const errors = readEnv(env, "LINELOG_ENCODING_ERRORS");
  if (errors === "strict" || errors === "replace" || errors === "ignore") {
    options.fileEncodingErrors = errors;
  }
  const buffering = readEnv(env, "LINELOG_BUFFERING");
  if (buffering === "line" || buffering === "durable") {
    options.fileBuffering = buffering;
  }

  return options;
}

/** 从环境变量创建 Policy（用于命令行启动） */
export function loadPolicyFromEnv(env: NodeJS.ProcessEnv = process.env): Policy {
  return createPolicy(loadPolicyOptionsFromEnv(env));
}
