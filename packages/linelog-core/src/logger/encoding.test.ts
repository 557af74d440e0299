import { describe, it, expect } from "vitest";
import { encodeText, EncodingError } from "./encoding.js";

describe("encodeText", () => {
  it("should replace characters outside ascii with ?", () => {
    expect(encodeText("héllo", "ascii", "replace").toString("latin1")).toBe("h?llo");
  });

  it("should drop unencodable characters under ignore", () => {
    expect(encodeText("héllo", "ascii", "ignore").toString("latin1")).toBe("hllo");
  });

  it("should throw under strict", () => {
    expect(() => encodeText("héllo", "ascii", "strict")).toThrow(EncodingError);
  });

  it("should keep latin1 characters in latin1", () => {
    const buf = encodeText("héllo", "latin1", "strict");
    expect(buf.length).toBe(5);
    expect(buf[1]).toBe(0xe9);
  });

  it("should handle lone surrogates in utf-8", () => {
    expect(encodeText("a\ud800b", "utf-8", "replace").toString("utf8")).toBe("a\ufffdb");
    expect(encodeText("a\ud800b", "utf-8", "ignore").toString("utf8")).toBe("ab");
    expect(() => encodeText("a\ud800b", "utf8", "strict")).toThrow("Cannot encode U+D800 as utf8");
  });

  it("should encode utf16le", () => {
    expect(encodeText("hi", "utf16le", "strict").length).toBe(4);
  });
});
