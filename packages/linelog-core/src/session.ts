/**
 * linelog - 会话生命周期
 *
 * 宿主显式打开、显式关闭：准备目录 → 创建 Printer → （可选）接管 stderr。
 * 不注册任何退出钩子，close() 由宿主在退出前调用。
 */

import { prepareLogDirectory } from "./logger/log-dir.js";
import { loadPolicyFromEnv } from "./logger/env.js";
import { createPrint, type PrintFunction } from "./logger/print.js";
import { Printer } from "./logger/printer.js";
import {
  ErrorStreamCapture,
  monitorUncaughtExceptions,
  type InterceptableStream,
  type UncaughtExceptionSource,
} from "./logger/stderr-capture.js";
import type { ConsoleStream, Policy } from "./logger/types.js";

export interface PrintSessionHost {
  stdout?: ConsoleStream;
  /** 会被接管的错误流，默认 process.stderr */
  stderr?: ConsoleStream & InterceptableStream;
  /** 传入时监听其未捕获异常 */
  process?: UncaughtExceptionSource;
  now?: () => Date;
}

export interface PrintSession {
  print: PrintFunction;
  printer: Printer;
  /** captureStderr 关闭时为 null */
  capture: ErrorStreamCapture | null;
  /** flush 缓冲的 stderr 片段、恢复原始流、关闭日志文件。可重复调用 */
  close(): void;
}

export function openPrintSession(policy: Policy, host: PrintSessionHost = {}): PrintSession {
  const stderr = host.stderr ?? process.stderr;
  prepareLogDirectory(policy, { now: host.now, stderr });

  const printer = new Printer(policy, { stdout: host.stdout, stderr, now: host.now });

  let capture: ErrorStreamCapture | null = null;
  let restore = (): void => undefined;
  let detach = (): void => undefined;
  if (policy.captureStderr) {
    const installed = ErrorStreamCapture.install(printer, stderr);
    capture = installed.capture;
    restore = installed.restore;
    if (host.process) {
      detach = monitorUncaughtExceptions(installed.capture, host.process);
    }
  }

  let closed = false;
  return {
    print: createPrint(printer),
    printer,
    capture,
    close() {
      if (closed) return;
      closed = true;
      detach();
      capture?.flush();
      restore();
      printer.close();
    },
  };
}

/** 从环境变量打开会话（用于命令行启动） */
export function openPrintSessionFromEnv(host: PrintSessionHost = {}, env: NodeJS.ProcessEnv = process.env): PrintSession {
  return openPrintSession(loadPolicyFromEnv(env), host);
}
