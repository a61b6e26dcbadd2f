import { describe, it, expect } from "vitest";
import { createLogger, isLogLevel, safeStringify, type LogSink } from "../src/utils/logger";

function captureSink(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  const push = (m: string) => {
    lines.push(m);
  };
  return { sink: { error: push, warn: push, info: push, debug: push }, lines };
}

describe("Logger", () => {
  it("drops messages below the configured level", () => {
    const { sink, lines } = captureSink();
    const log = createLogger({ name: "t", level: "warn", timestamp: false, sink });

    log.info("quiet");
    log.debug("quieter");
    log.warn("careful");
    log.error("broken");

    expect(lines).toEqual(["[t] WARN: careful", "[t] ERROR: broken"]);
  });

  it("appends the payload as JSON, bigints included", () => {
    const { sink, lines } = captureSink();
    const log = createLogger({ name: "t", timestamp: false, sink });

    log.info("parsed", { value: 9n, ok: true });
    expect(lines).toEqual(['[t] INFO: parsed {"value":"9n","ok":true}']);
  });

  it("omits the payload when includePayload is off", () => {
    const { sink, lines } = captureSink();
    createLogger({ name: "t", timestamp: false, includePayload: false, sink }).info("x", { a: 1 });
    expect(lines).toEqual(["[t] INFO: x"]);
  });

  it("prefixes child loggers with the parent name", () => {
    const { sink, lines } = captureSink();
    createLogger({ name: "quill", timestamp: false, sink }).child("lsp").info("ready");
    expect(lines).toEqual(["[quill:lsp] INFO: ready"]);
  });

  it("is silent at level silent", () => {
    const { sink, lines } = captureSink();
    const log = createLogger({ timestamp: false, sink });
    log.setLevel("silent");
    log.error("nobody hears");
    expect(log.getLevel()).toBe("silent");
    expect(lines).toEqual([]);
  });

  it("times a section at debug level", () => {
    const { sink, lines } = captureSink();
    const log = createLogger({ name: "t", level: "debug", timestamp: false, sink });

    const ms = log.time("parse").end();

    expect(ms).toBeGreaterThanOrEqual(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[t\] DEBUG: end parse \(\d+\.\d{2}ms\)$/);
  });

  it("starts lines with a timestamp by default", () => {
    const { sink, lines } = captureSink();
    createLogger({ name: "t", sink }).info("hello");
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z \[t\] INFO: hello$/);
  });

  it("validates level names", () => {
    expect(isLogLevel("trace")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
  });

  it("falls back to String() for values JSON cannot encode", () => {
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    expect(safeStringify(cyclic)).toBe("[object Object]");
  });
});
