/**
 * linelog - 错误流接管
 *
 * 站在原始 stderr 前面：原样转发给终端，同时按行切分，把每个完整行以 error 级别写入日志文件。
 * 不完整的尾部留在缓冲里，直到遇到换行或显式 flush。
 */

import { StringDecoder } from "node:string_decoder";
import type { Printer } from "./printer.js";

type WriteCallback = (err?: Error | null) => void;

/** 原始错误流：process.stderr 满足此接口 */
export interface RawErrorStream {
  write(chunk: string | Uint8Array, callback?: WriteCallback): unknown;
  flush?(): void;
}

/** 可被接管的流（其 write 会被替换） */
export interface InterceptableStream {
  write: NodeJS.WritableStream["write"];
}

/** 未捕获异常的事件源：process 满足此接口 */
export interface UncaughtExceptionSource {
  on(event: "uncaughtExceptionMonitor", listener: (err: Error) => void): unknown;
  off(event: "uncaughtExceptionMonitor", listener: (err: Error) => void): unknown;
}

export interface InstalledCapture {
  capture: ErrorStreamCapture;
  /** 恢复原始 write；只在仍是本次接管时生效，可重复调用 */
  restore(): void;
}

export class ErrorStreamCapture {
  private pending = "";
  private readonly decoder = new StringDecoder("utf8");

  constructor(
    private readonly printer: Printer,
    private readonly original: RawErrorStream
  ) {}

  /** 尚未换行的缓冲内容 */
  get buffered(): string {
    return this.pending;
  }

  write(chunk: string | Uint8Array, callback?: WriteCallback): boolean {
    try {
      this.original.write(chunk, callback);
    } catch {
      // 原始流不可用时仍然记录到文件
    }
    this.record(typeof chunk === "string" ? chunk : this.decoder.write(Buffer.from(chunk)));
    return true;
  }

  /** 只切分记录，不转发到原始流 */
  record(text: string): void {
    this.pending += text;
    let idx = this.pending.indexOf("\n");
    while (idx !== -1) {
      const line = this.pending.slice(0, idx);
      this.pending = this.pending.slice(idx + 1);
      this.printer.appendRaw(line + "\n", "error");
      idx = this.pending.indexOf("\n");
    }
  }

  flush(): void {
    try {
      this.original.flush?.();
    } catch {
      // 忽略
    }
    if (this.pending) {
      const rest = this.pending;
      this.pending = "";
      this.printer.appendRaw(rest, "error");
    }
  }

  /**
   * 接管一个流的 write。宿主在启动时调用，退出前调用 restore()。
   */
  static install(printer: Printer, stream: InterceptableStream): InstalledCapture {
    const originalWrite = stream.write;
    const forward = originalWrite.bind(stream);
    const capture = new ErrorStreamCapture(printer, {
      write: (chunk, callback) => forward(chunk, callback),
    });

    const patched: NodeJS.WritableStream["write"] = (
      chunk: string | Uint8Array,
      encodingOrCallback?: BufferEncoding | WriteCallback,
      callback?: WriteCallback
    ): boolean => {
      const cb = typeof encodingOrCallback === "function" ? encodingOrCallback : callback;
      if (typeof chunk !== "string" || typeof encodingOrCallback !== "string") {
        return capture.write(chunk, cb);
      }
      // 指定了编码的字符串先转成字节，保证终端收到的内容一致
      return capture.write(Buffer.from(chunk, encodingOrCallback), cb);
    };
    stream.write = patched;

    return {
      capture,
      restore() {
        if (stream.write === patched) {
          stream.write = originalWrite;
        }
      },
    };
  }
}

/**
 * 监听未捕获异常，把堆栈写入日志文件。
 * 终端上的崩溃输出仍由运行时负责，这里只记录，不重复打印。返回取消监听的函数。
 */
export function monitorUncaughtExceptions(capture: ErrorStreamCapture, proc: UncaughtExceptionSource = process): () => void {
  const listener = (err: Error): void => {
    // 先把 stderr 里写了一半的行收尾，堆栈从新行开始
    if (capture.buffered) capture.record("\n");
    capture.record(`${err.stack ?? String(err)}\n`);
    capture.flush();
  };
  proc.on("uncaughtExceptionMonitor", listener);
  return () => {
    proc.off("uncaughtExceptionMonitor", listener);
  };
}
