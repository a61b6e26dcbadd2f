import { describe, it, expect } from "vitest";
import { parseSource, parseTokens } from "../src/core/parser";
import { tokenize } from "../src/core/lexer";
import type { Expression, Statement } from "../src/core/ast";
import { LexError, ParseError } from "../src/diagnostics/errors";

function body(source: string): readonly Statement[] {
  return parseSource(source).functions[0].body.statements;
}

/** Expression of `fn t() -> Int { return <expr>; }`. */
function expr(text: string): Expression {
  const [st] = body(`fn t() -> Int { return ${text}; }`);
  if (st.kind !== "Return") throw new Error(`expected Return, got ${st.kind}`);
  return st.value;
}

/** Parenthesized form of an expression tree, for precedence checks. */
function shape(e: Expression): string {
  switch (e.kind) {
    case "Binary":
      return `(${shape(e.left)} ${e.op} ${shape(e.right)})`;
    case "Variable":
      return e.name;
    case "IntLiteral":
      return String(e.value);
    case "Call":
      return `${e.callee}(${e.args.map(shape).join(", ")})`;
    default:
      return e.kind;
  }
}

function parseError(source: string): ParseError {
  try {
    parseSource(source);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected a ParseError for ${JSON.stringify(source)}`);
}

describe("Parser", () => {
  describe("expressions", () => {
    it("binds * tighter than +", () => {
      expect(shape(expr("a + b * c"))).toBe("(a + (b * c))");
    });

    it("folds same-level operators to the left", () => {
      expect(shape(expr("1 - 2 - 3"))).toBe("((1 - 2) - 3)");
      expect(shape(expr("8 / 4 * 2"))).toBe("((8 / 4) * 2)");
    });

    it("places comparison above equality", () => {
      expect(shape(expr("a < b == c >= d"))).toBe("((a < b) == (c >= d))");
    });

    it("treats = as an equality-level operator", () => {
      expect(shape(expr("a = b + 1"))).toBe("(a = (b + 1))");
      expect(shape(expr("a = b != c"))).toBe("((a = b) != c)");
    });

    it("honors parentheses", () => {
      expect(shape(expr("(a + b) * c"))).toBe("((a + b) * c)");
    });

    it("parses calls with arguments in source order", () => {
      expect(shape(expr("f(1, x + 2, g())"))).toBe("f(1, (x + 2), g())");
    });

    it("parses every literal kind", () => {
      expect(expr("42")).toMatchObject({ kind: "IntLiteral", value: 42n });
      expect(expr("1.5")).toMatchObject({ kind: "FloatLiteral", value: 1.5 });
      expect(expr('"a\\tb"')).toMatchObject({ kind: "StringLiteral", value: "a\tb" });
      expect(expr("'z'")).toMatchObject({ kind: "CharLiteral", value: "z" });
      expect(expr("'\u{1F600}'")).toMatchObject({ kind: "CharLiteral", value: "\u{1F600}" });
      expect(expr("true")).toMatchObject({ kind: "BoolLiteral", value: true });
      expect(expr("false")).toMatchObject({ kind: "BoolLiteral", value: false });
      expect(expr("Void")).toMatchObject({ kind: "VoidLiteral" });
      expect(expr("x")).toMatchObject({ kind: "Variable", name: "x" });
    });

    it("accepts the largest signed 64-bit integer", () => {
      expect(expr("9223372036854775807")).toMatchObject({ value: 9223372036854775807n });
    });

    it("records expression ranges", () => {
      expect(expr("a + bc").range).toEqual({
        start: { line: 1, column: 24 },
        end: { line: 1, column: 30 },
      });
    });
  });

  describe("declarations and statements", () => {
    it("parses a function with parameters, a let and an if/else", () => {
      const program = parseSource(
        "fn f(x: Int, name: String) -> Bool {\n" +
          "  let y: Int = x + 1;\n" +
          "  let z: Float;\n" +
          "  if y > 2 { return true; } else { return false; }\n" +
          "}\n"
      );

      expect(program.functions).toHaveLength(1);
      const fn = program.functions[0];
      expect(fn.name).toBe("f");
      expect(fn.returnType).toBe("Bool");
      expect(fn.params.map((p) => [p.name, p.varType])).toEqual([
        ["x", "Int"],
        ["name", "String"],
      ]);

      const [letY, letZ, ifSt] = fn.body.statements;
      expect(letY).toMatchObject({ kind: "LetDecl", name: "y", varType: "Int" });
      expect(letZ).toMatchObject({ kind: "LetDecl", name: "z", varType: "Float", init: null });

      if (ifSt.kind !== "If") throw new Error("expected If");
      expect(ifSt.thenBranch.map((s) => s.kind)).toEqual(["Return"]);
      expect(ifSt.elseBranch?.map((s) => s.kind)).toEqual(["Return"]);
    });

    it("leaves elseBranch null without else", () => {
      const [st] = body("fn f() -> Void { if a { g(); } }");
      expect(st).toMatchObject({ kind: "If", elseBranch: null });
    });

    it("wraps bare expressions in ExpressionStatement", () => {
      const [st] = body("fn f() -> Void { g(1); }");
      expect(st.kind).toBe("ExpressionStatement");
      if (st.kind === "ExpressionStatement") expect(st.expression).toMatchObject({ kind: "Call", callee: "g" });
    });

    it("lets the last statement of a block omit its semicolon", () => {
      expect(body("fn f() -> Int { let a: Int = 1; return a }").map((s) => s.kind)).toEqual(["LetDecl", "Return"]);
    });

    it("parses an empty body and keeps function order", () => {
      const program = parseSource("fn a() -> Void {}\n// between\nfn b() -> Int { return 0; }");
      expect(program.functions.map((f) => f.name)).toEqual(["a", "b"]);
      expect(program.functions[0].body.statements).toEqual([]);
    });

    it("parses an empty source", () => {
      expect(parseSource("  // nothing here\n").functions).toEqual([]);
    });

    it("records function ranges from `fn` to `}`", () => {
      const fn = parseSource("fn f() -> Int { return 1; }").functions[0];
      expect(fn.range).toEqual({ start: { line: 1, column: 1 }, end: { line: 1, column: 28 } });
    });

    it("freezes the tree", () => {
      const program = parseSource("fn f(a: Int) -> Int { return a; }");
      const fn = program.functions[0];
      expect(Object.isFrozen(program)).toBe(true);
      expect(Object.isFrozen(program.functions)).toBe(true);
      expect(Object.isFrozen(fn.params)).toBe(true);
      expect(Object.isFrozen(fn.params[0])).toBe(true);
      expect(Object.isFrozen(fn.body.statements)).toBe(true);
    });

    it("gives every node its own frozen range", () => {
      const program = parseSource("fn f() -> Int { return x; }");
      const fn = program.functions[0];
      const ret = fn.body.statements[0];

      expect(Object.isFrozen(fn.range)).toBe(true);
      expect(Object.isFrozen(fn.range.start)).toBe(true);
      expect(Object.isFrozen(fn.range.end)).toBe(true);
      expect(fn.range.end).not.toBe(fn.body.range.end);
      expect(fn.range.end).toEqual(fn.body.range.end);
      if (ret.kind !== "Return") throw new Error(`expected Return, got ${ret.kind}`);
      expect(ret.value.range.end).not.toBe(ret.range.end);
    });

    it("does not share range objects between a statement and its expression", () => {
      const [stmt] = parseSource("fn f() -> Void { g(); }").functions[0].body.statements;
      expect(stmt.kind).toBe("ExpressionStatement");
      if (stmt.kind !== "ExpressionStatement") return;

      expect(stmt.range).toEqual(stmt.expression.range);
      expect(stmt.range).not.toBe(stmt.expression.range);
      expect(stmt.range.start).not.toBe(stmt.expression.range.start);
    });

    it("copies token end positions instead of reusing them", () => {
      const source = "fn f() -> Int { return 1; }";
      const tokens = tokenize(source);
      const program = parseTokens(tokens);
      const rbrace = tokens[tokens.length - 2];

      expect(Object.isFrozen(rbrace.end)).toBe(true);
      expect(program.functions[0].range.end).toEqual(rbrace.end);
      expect(program.functions[0].range.end).not.toBe(rbrace.end);
    });
  });

  describe("parseTokens", () => {
    it("builds the same tree as parsing the source", () => {
      const source = "fn add(a: Int, b: Int) -> Int { let s: Int = a + b * 2; return s; }";
      expect(parseTokens(tokenize(source))).toEqual(parseSource(source));
    });

    it("reports parse errors at the offending token", () => {
      expect(() => parseTokens(tokenize("fn f( -> Int {}"))).toThrow("expected parameter name");
    });

    it("requires a list ending in EOF", () => {
      expect(() => parseTokens([])).toThrow("token list must end with EOF");
      expect(() => parseTokens(tokenize("fn").slice(0, 1))).toThrow("token list must end with EOF");
    });
  });

  describe("errors", () => {
    it("reports a missing closing brace at end of input", () => {
      const err = parseError("fn f() -> Int { return 1;");
      expect(err.message).toBe("expected `}`");
      expect([err.line, err.col]).toEqual([1, 26]);
      expect(err.render()).toBe("Parse error at line 1, col 26: expected `}`");
    });

    it("reports an unknown type name", () => {
      const err = parseError("fn f(x: Foo) -> Int {}");
      expect(err.message).toBe("unknown type: Foo");
      expect(err.col).toBe(9);
    });

    it("names the missing construct", () => {
      expect(parseError("fn f() Int {}").message).toBe("expected `->`");
      expect(parseError("fn f() -> 5 {}").message).toBe("expected return type");
      expect(parseError("fn (x: Int) -> Int {}").message).toBe("expected function name");
      expect(parseError("fn f(x Int) -> Int {}").message).toBe("expected `:`");
      expect(parseError("fn f(x: Int -> Int {}").message).toBe("expected `)`");
      expect(parseError("fn f() -> Int return 1;").message).toBe("expected `{`");
      expect(parseError("let x: Int;").message).toBe("expected `fn`");
      expect(parseError("fn f() -> Int { let : Int; }").message).toBe("expected variable name");
      expect(parseError("fn f() -> Int { let x: 3; }").message).toBe("expected type name");
    });

    it("requires a semicolon between statements", () => {
      const err = parseError("fn f() -> Int { return 1 return 2; }");
      expect(err.message).toBe("expected `;` after statement");
      expect(err.col).toBe(26);
    });

    it("rejects tokens that cannot start an expression", () => {
      expect(parseError("fn f() -> Int { return ; }").message).toBe("unexpected token in expression");
      expect(parseError("fn f() -> Int { return Int; }").message).toBe("unexpected token in expression");
    });

    it("rejects an empty char literal", () => {
      expect(parseError("fn f() -> Void { let c: Char = ''; }").message).toBe("empty char literal");
    });

    it("rejects integers outside the signed 64-bit range", () => {
      expect(parseError("fn f() -> Int { return 9223372036854775808; }").message).toBe(
        "integer literal out of range"
      );
    });

    it("lets lexer errors through unchanged", () => {
      expect(() => parseSource("fn f() -> Int { return @; }")).toThrow(LexError);
    });
  });
});
