import { describe, it, expect } from "vitest";
import { analyzeText } from "../src/language/quill.language";
import { LexError, ParseError } from "../src/diagnostics/errors";
import { createLogger } from "../src/utils/logger";

describe("analyzeText", () => {
  it("returns tokens and the program for valid source", () => {
    const result = analyzeText("fn main() -> Int { return 0; }");

    expect(result.ok).toBe(true);
    expect(result.error).toBeNull();
    expect(result.diagnostics).toEqual([]);
    expect(result.tokens).toHaveLength(12);
    expect(result.program?.functions.map((f) => f.name)).toEqual(["main"]);
  });

  it("parses the same token list it returns", () => {
    const result = analyzeText("\tfn f() -> Void {}", { tabSize: 8 });

    expect(result.tokens[0]).toMatchObject({ lexeme: "fn", line: 1, col: 9 });
    expect(result.program?.range.start).toEqual({ line: 1, column: 9 });
    expect(result.program?.functions[0].range.end).toEqual(result.tokens[result.tokens.length - 2].end);
  });

  it("reports a parse error as one diagnostic and keeps the tokens", () => {
    const result = analyzeText("fn main() -> Int { return 0;");

    expect(result.ok).toBe(false);
    expect(result.program).toBeNull();
    expect(result.tokens.length).toBeGreaterThan(0);
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.diagnostics).toEqual([
      {
        severity: "error",
        code: "PARSE_ERROR",
        message: "expected `}`",
        range: { start: { line: 1, column: 29 }, end: { line: 1, column: 30 } },
        source: "parser",
      },
    ]);
  });

  it("reports a lexer error and skips parsing", () => {
    const result = analyzeText("fn @");

    expect(result.tokens).toEqual([]);
    expect(result.program).toBeNull();
    expect(result.error).toBeInstanceOf(LexError);
    expect(result.diagnostics[0]).toMatchObject({ code: "LEX_ERROR", range: { start: { line: 1, column: 4 } } });
  });

  it("passes the tab size to the lexer", () => {
    const result = analyzeText("fn\t@", { tabSize: 8 });
    expect(result.error?.col).toBe(9);
  });

  it("logs stage timings at debug level", () => {
    const lines: string[] = [];
    const push = (m: string) => {
      lines.push(m);
    };
    const logger = createLogger({
      name: "t",
      level: "debug",
      timestamp: false,
      sink: { error: push, warn: push, info: push, debug: push },
    });

    analyzeText("fn f() -> Void {}", { logger });

    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith('[t] DEBUG: analyzed {"tokens":9,"ok":true,')).toBe(true);
  });
});
