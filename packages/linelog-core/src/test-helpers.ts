import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { InterceptableStream } from "./logger/stderr-capture.js";
import type { ConsoleStream } from "./logger/types.js";

type WriteCallback = (err?: Error | null) => void;

/** 内存中的控制台流 */
export class MemoryStream implements ConsoleStream {
  chunks: string[] = [];
  flushes = 0;
  destroyed = false;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  flush(): void {
    this.flushes++;
  }

  text(): string {
    return this.chunks.join("");
  }
}

/** 可被接管的假 stderr，记录原始 write 收到的内容 */
export function createFakeStderr(): ConsoleStream & InterceptableStream & { seen: string[] } {
  const seen: string[] = [];
  const write = (
    chunk: string | Uint8Array,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback
  ): boolean => {
    seen.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    const cb = typeof encodingOrCallback === "function" ? encodingOrCallback : callback;
    cb?.();
    return true;
  };
  return { seen, write };
}

/** 可手动拨动的时钟 */
export function createClock(iso: string): { now: () => Date; set(iso: string): void } {
  let current = new Date(iso);
  return {
    now: () => current,
    set(next: string) {
      current = new Date(next);
    },
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `linelog_${prefix}_`));
}

export function readText(filePath: string): string {
  return fs.readFileSync(filePath, "utf-8");
}
