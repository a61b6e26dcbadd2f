import { describe, it, expect } from "vitest";
import { analyzeText, dumpProgram, parseSource, ParseError, TokenKind, tokenize } from "../src";

describe("package entry", () => {
  it("exposes the front end from one import", () => {
    expect(tokenize("fn")[0].kind).toBe(TokenKind.KW_FN);
    expect(dumpProgram(parseSource("fn f() -> Void {}"))).toBe("Program\n  Function f -> Void\n    Block");
    expect(analyzeText("fn").error).toBeInstanceOf(ParseError);
  });
});
