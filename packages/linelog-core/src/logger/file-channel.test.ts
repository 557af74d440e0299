import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createClock, makeTempDir, readText } from "../test-helpers.js";
import { RotatingFileChannel } from "./file-channel.js";
import { createPolicy } from "./policy.js";

describe("RotatingFileChannel", () => {
  let dir: string;
  let clock: ReturnType<typeof createClock>;

  beforeEach(() => {
    dir = makeTempDir("channel");
    clock = createClock("2026-03-01T10:20:30Z");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  /** writeSync 收到的内容（按调用顺序） */
  function writtenText(spy: { mock: { calls: unknown[][] } }): string[] {
    return spy.mock.calls.map((call) => {
      const data = call[1];
      return data instanceof Uint8Array ? Buffer.from(data).toString("utf8") : String(data);
    });
  }

  function open(overrides: Parameters<typeof createPolicy>[0] = {}): RotatingFileChannel {
    const channel = new RotatingFileChannel(createPolicy({ logsDir: dir, ...overrides }), { now: clock.now });
    channel.ensureCurrent(true);
    return channel;
  }

  const day1 = (): string => path.join(dir, "log_2026-03-01.txt");
  const day2 = (): string => path.join(dir, "log_2026-03-02.txt");

  it("should write a tagged line", () => {
    const channel = open();
    channel.append("hello\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] hello\n");
  });

  it("should continue an unterminated line without a second preamble", () => {
    const channel = open();
    channel.append("Loading", "[INFO]");
    channel.append("...Done!\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] Loading...Done!\n");
  });

  it("should overwrite the last entry on a carriage return", () => {
    const channel = open();
    channel.append("start\n", "[INFO]");
    channel.append("Progress 10%", "[INFO]");
    channel.append("\rProgress 50%", "[INFO]");
    channel.append("\rProgress 100%\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] start\n[10:20:30] [INFO] Progress 100%\n");
  });

  it("should replace a completed entry as well", () => {
    const channel = open();
    channel.append("line one\n", "[INFO]");
    channel.append("\rreplaced\n", "[WARN]");
    expect(readText(day1())).toBe("[10:20:30] [WARN] replaced\n");
  });

  it("should only replace the last line of a multi-line entry", () => {
    const channel = open();
    channel.append("a\nb\n", "[INFO]");
    channel.append("\rc\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] a\n[10:20:30] [INFO] c\n");
  });

  it("should never truncate content written before the file was opened", () => {
    fs.writeFileSync(day1(), "old\n");
    const channel = open();
    channel.append("\rnew\n", "[INFO]");
    expect(readText(day1())).toBe("old\n[10:20:30] [INFO] new\n");
  });

  it.skipIf(process.platform === "win32")("should keep the carriage return on a target that cannot be truncated", () => {
    const writeSpy = vi.spyOn(fs, "writeSync");
    const truncateSpy = vi.spyOn(fs, "ftruncateSync");
    const channel = new RotatingFileChannel(createPolicy({ logsDir: dir, filenameForDate: () => "/dev/null" }), {
      now: clock.now,
    });

    expect(channel.ensureCurrent(true)).toBe(true);
    expect(() => channel.append("\rx\n", "[INFO]")).not.toThrow();
    channel.append("after\n", "[INFO]");

    expect(truncateSpy).not.toHaveBeenCalled();
    expect(writtenText(writeSpy)).toEqual(["[10:20:30] [INFO] \rx\n", "[10:20:30] [INFO] after\n"]);
    expect(channel.isOpen).toBe(true);
    channel.close();
  });

  it("should append without truncating when truncation fails", () => {
    const channel = open();
    channel.append("old entry\n", "[INFO]");
    vi.spyOn(fs, "ftruncateSync").mockImplementation(() => {
      throw new Error("EINVAL");
    });
    channel.append("\rnew\n", "[INFO]");
    channel.append("next\n", "[INFO]");
    expect(readText(day1())).toBe(
      "[10:20:30] [INFO] old entry\n[10:20:30] [INFO] \rnew\n[10:20:30] [INFO] next\n"
    );
  });

  it("should ignore empty text", () => {
    const channel = new RotatingFileChannel(createPolicy({ logsDir: dir }), { now: clock.now });
    channel.append("", "[INFO]");
    expect(fs.existsSync(day1())).toBe(false);
  });

  it("should rotate when the date changes", () => {
    const channel = open();
    channel.append("day one\n", "[INFO]");
    clock.set("2026-03-02T00:00:01Z");
    channel.append("day two\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] day one\n");
    expect(readText(day2())).toBe("[00:00:01] [INFO] day two\n");
    expect(channel.currentPath).toBe(day2());
  });

  it("should start a fresh line in the new file", () => {
    const channel = open();
    channel.append("partial", "[INFO]");
    clock.set("2026-03-02T00:00:01Z");
    channel.append("rest\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] partial");
    expect(readText(day2())).toBe("[00:00:01] [INFO] rest\n");
  });

  it("should rotate at midnight of the configured time zone", () => {
    clock.set("2026-03-01T14:59:59Z");
    const channel = open({ timeZone: "Asia/Tokyo" });
    channel.append("before\n", "[INFO]");
    clock.set("2026-03-01T15:00:00Z");
    channel.append("after\n", "[INFO]");
    expect(readText(day1())).toBe("[23:59:59] [INFO] before\n");
    expect(readText(day2())).toBe("[00:00:00] [INFO] after\n");
  });

  it("should degrade when the file cannot be opened and recover later", () => {
    const missing = path.join(dir, "missing");
    const warnings: string[] = [];
    const channel = new RotatingFileChannel(createPolicy({ logsDir: missing }), {
      now: clock.now,
      onWarning: (msg) => warnings.push(msg),
    });

    expect(channel.ensureCurrent(true)).toBe(false);
    channel.append("lost\n", "[INFO]");
    channel.append("lost again\n", "[INFO]");
    expect(channel.isOpen).toBe(false);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain(path.join(missing, "log_2026-03-01.txt"));

    fs.mkdirSync(missing);
    channel.append("ok\n", "[INFO]");
    expect(readText(path.join(missing, "log_2026-03-01.txt"))).toBe("[10:20:30] [INFO] ok\n");
  });

  it("should drop an entry that cannot be encoded under strict", () => {
    const channel = open({ fileEncoding: "ascii", fileEncodingErrors: "strict" });
    channel.append("héllo\n", "[INFO]");
    channel.append("ok\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] ok\n");
  });

  it("should keep offsets in bytes for multi-byte text", () => {
    const channel = open();
    channel.append("日本語\n", "[INFO]");
    channel.append("progress", "[INFO]");
    channel.append("\rdone\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] 日本語\n[10:20:30] [INFO] done\n");
  });

  it("should write through under durable buffering", () => {
    const channel = open({ fileBuffering: "durable" });
    channel.append("synced\n", "[INFO]");
    expect(readText(day1())).toBe("[10:20:30] [INFO] synced\n");
  });

  it("should close idempotently", () => {
    const channel = open();
    channel.close();
    channel.close();
    expect(channel.isOpen).toBe(false);
    expect(channel.currentPath).toBeNull();
  });
});
