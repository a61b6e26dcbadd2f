// src/core/dump.ts
//
// Text renderings used by the CLI:
//   - dumpProgram: depth-first tree, two spaces per nesting level
//   - dumpTokens: one "<line>:<col> <KIND> <lexeme>" line per token
//
// Pure string builders; printing is the caller's job.

import type { Expression, FunctionDecl, Node, Program, Statement } from "./ast";
import type { Token } from "./lexer";

const INDENT = "  ";

export function dumpProgram(program: Program): string {
  const out: string[] = [];
  dumpNode(program, 0, out);
  return out.join("\n");
}

export function dumpTokens(tokens: readonly Token[]): string {
  return tokens.map((t) => `${t.line}:${t.col} ${t.kind} ${JSON.stringify(t.lexeme)}`).join("\n");
}

/* =========================================================
   Tree rendering
   ========================================================= */

function dumpNode(n: Node, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);

  switch (n.kind) {
    case "Program":
      out.push(`${pad}Program`);
      for (const fn of n.functions) dumpNode(fn, depth + 1, out);
      return;

    case "Function":
      dumpFunction(n, depth, out);
      return;

    case "Block":
      out.push(`${pad}Block`);
      dumpStatements(n.statements, depth + 1, out);
      return;

    case "Return":
      out.push(`${pad}Return`);
      dumpNode(n.value, depth + 1, out);
      return;

    case "If":
      out.push(`${pad}If`);
      dumpNode(n.condition, depth + 1, out);
      out.push(`${pad}Then:`);
      dumpStatements(n.thenBranch, depth + 1, out);
      if (n.elseBranch) {
        out.push(`${pad}Else:`);
        dumpStatements(n.elseBranch, depth + 1, out);
      }
      return;

    case "LetDecl":
      out.push(`${pad}Let(${n.name}: ${n.varType})`);
      if (n.init) dumpNode(n.init, depth + 1, out);
      return;

    case "ExpressionStatement":
      out.push(`${pad}Expr`);
      dumpNode(n.expression, depth + 1, out);
      return;

    default:
      dumpExpression(n, depth, out);
  }
}

function dumpFunction(fn: FunctionDecl, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);
  out.push(`${pad}Function ${fn.name} -> ${fn.returnType}`);
  for (const p of fn.params) out.push(`${pad}${INDENT}Param: ${p.name}: ${p.varType}`);
  dumpNode(fn.body, depth + 1, out);
}

function dumpStatements(list: readonly Statement[], depth: number, out: string[]): void {
  for (const st of list) dumpNode(st, depth, out);
}

function dumpExpression(e: Expression, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);

  switch (e.kind) {
    case "IntLiteral":
      out.push(`${pad}Int(${e.value})`);
      return;
    case "FloatLiteral":
      out.push(`${pad}Float(${e.value})`);
      return;
    case "StringLiteral":
      out.push(`${pad}String(${e.value})`);
      return;
    case "CharLiteral":
      out.push(`${pad}Char('${e.value}')`);
      return;
    case "BoolLiteral":
      out.push(`${pad}Bool(${e.value})`);
      return;
    case "VoidLiteral":
      out.push(`${pad}Void`);
      return;
    case "Variable":
      out.push(`${pad}Var(${e.name})`);
      return;
    case "Binary":
      out.push(`${pad}Binary(${e.op})`);
      dumpExpression(e.left, depth + 1, out);
      dumpExpression(e.right, depth + 1, out);
      return;
    case "Call":
      out.push(`${pad}Call(${e.callee})`);
      for (const arg of e.args) dumpExpression(arg, depth + 1, out);
      return;
  }
}
