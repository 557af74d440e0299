/**
 * linelog - Printer（分发核心）
 *
 * 所有 print 风格的调用都从这里进入：拼接消息，持锁写控制台，再交给 RotatingFileChannel 写文件。
 * 任何输出失败都不会抛给调用方。
 */

import { colorize, writeConsole } from "./console.js";
import { RotatingFileChannel } from "./file-channel.js";
import { SyncLock } from "./lock.js";
import { tagFor, type ConsoleStream, type Policy, type Severity } from "./types.js";

export interface EmitOptions {
  /** 各部分之间的分隔符，默认 " " */
  sep?: string;
  /** 结尾，默认 "\n" */
  end?: string;
  /** 指定输出流：不着色、不写文件 */
  file?: ConsoleStream;
  /** 写完立即 flush 控制台 */
  flush?: boolean;
}

export interface PrinterOptions {
  stdout?: ConsoleStream;
  /** 诊断信息的去向（打开日志文件失败等） */
  stderr?: ConsoleStream;
  now?: () => Date;
}

/** String() 也可能抛错（无原型对象、toString 抛错），最后退到 Object.prototype.toString */
function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

export function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || (typeof value !== "object" && typeof value !== "function")) return String(value);
  try {
    if (value instanceof Error) return value.stack ?? value.message;
    if (typeof value === "function") return safeString(value);
    return JSON.stringify(value) ?? safeString(value);
  } catch {
    return safeString(value);
  }
}

export class Printer {
  readonly policy: Policy;
  private readonly lock = new SyncLock();
  private readonly channel: RotatingFileChannel;
  private readonly stdout: ConsoleStream;
  private closed = false;

  constructor(policy: Policy, opts: PrinterOptions = {}) {
    this.policy = policy;
    this.stdout = opts.stdout ?? process.stdout;
    const stderr = opts.stderr ?? process.stderr;
    this.channel = new RotatingFileChannel(policy, {
      now: opts.now,
      onWarning: (message) => writeConsole(stderr, message, true),
    });

    if (policy.logToFile) {
      this.lock.run(() => {
        this.channel.ensureCurrent(true);
      });
    }
  }

  /** 当前日志文件路径（未开启文件输出或打开失败时为 null） */
  get logFilePath(): string | null {
    return this.channel.currentPath;
  }

  emit(severity: Severity, parts: readonly unknown[], options: EmitOptions = {}): void {
    const { sep = " ", end = "\n", file, flush = false } = options;
    const message = parts.map(stringify).join(sep) + end;

    this.lock.run(() => {
      if (file) {
        writeConsole(file, message, flush);
        return;
      }
      if (this.policy.logToConsole) {
        const out = this.policy.useConsoleColors ? colorize(this.policy.colors, severity, message) : message;
        writeConsole(this.stdout, out, flush);
      }
      this.appendToFile(message, severity);
    });
  }

  /** 只写文件，不经过控制台（ErrorStreamCapture 使用） */
  appendRaw(text: string, severity: Severity): void {
    this.lock.run(() => {
      this.appendToFile(text, severity);
    });
  }

  print(...parts: unknown[]): void {
    this.emit("normal", parts);
  }

  info(...parts: unknown[]): void {
    this.emit("info", parts);
  }

  success(...parts: unknown[]): void {
    this.emit("success", parts);
  }

  warning(...parts: unknown[]): void {
    this.emit("warning", parts);
  }

  error(...parts: unknown[]): void {
    this.emit("error", parts, { flush: true });
  }

  debug(...parts: unknown[]): void {
    this.emit("debug", parts);
  }

  critical(...parts: unknown[]): void {
    this.emit("critical", parts, { flush: true });
  }

  /** 关闭日志文件；之后的输出只到控制台。可重复调用 */
  close(): void {
    this.lock.run(() => {
      this.closed = true;
      this.channel.close();
    });
  }

  private appendToFile(text: string, severity: Severity): void {
    if (!this.policy.logToFile || this.closed) return;
    this.channel.append(text, tagFor(this.policy, severity));
  }
}
