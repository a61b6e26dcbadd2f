// src/core/ast.ts
//
// Quill AST (Abstract Syntax Tree)
// --------------------------------
// Canonical node types produced by the parser:
//
//   Lexer  -> tokens
//   Parser -> AST (this file)
//   Dump / Language service / LSP -> consumers
//
// Every node is a plain object tagged by `kind` and frozen when the parser
// builds it. Children are owned by exactly one parent: the tree is never
// shared and has no cycles.

import type { Position, Range } from "../diagnostics/errors";

export type { Position, Range };

/* =========================================================
   Primitive types
   ========================================================= */

export const VAR_TYPES = ["Int", "Float", "String", "Char", "Bool", "Void"] as const;

export type VarType = (typeof VAR_TYPES)[number];

/** Name -> VarType lookup; undefined for any other name. */
export function lookupVarType(name: string): VarType | undefined {
  return VAR_TYPES.find((t) => t === name);
}

/* =========================================================
   Node kinds
   ========================================================= */

export type NodeBase = {
  readonly kind: string;
  readonly range: Range;
};

/* =========================================================
   Expressions
   ========================================================= */

export type Expression =
  | IntLiteral
  | FloatLiteral
  | StringLiteral
  | CharLiteral
  | BoolLiteral
  | VoidLiteral
  | Variable
  | Binary
  | Call;

export type IntLiteral = NodeBase & {
  readonly kind: "IntLiteral";
  /** Signed 64-bit value. */
  readonly value: bigint;
};

export type FloatLiteral = NodeBase & {
  readonly kind: "FloatLiteral";
  readonly value: number;
};

export type StringLiteral = NodeBase & {
  readonly kind: "StringLiteral";
  readonly value: string; // unescaped
};

export type CharLiteral = NodeBase & {
  readonly kind: "CharLiteral";
  readonly value: string; // exactly one code point
};

export type BoolLiteral = NodeBase & {
  readonly kind: "BoolLiteral";
  readonly value: boolean;
};

export type VoidLiteral = NodeBase & {
  readonly kind: "VoidLiteral";
};

export type Variable = NodeBase & {
  readonly kind: "Variable";
  readonly name: string;
};

export type BinaryOperator = "=" | "==" | "!=" | "<" | "<=" | ">" | ">=" | "+" | "-" | "*" | "/";

export type Binary = NodeBase & {
  readonly kind: "Binary";
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
};

export type Call = NodeBase & {
  readonly kind: "Call";
  readonly callee: string;
  readonly args: readonly Expression[];
};

/* =========================================================
   Statements
   ========================================================= */

export type Statement = Return | If | LetDecl | Block | ExpressionStatement;

export type Return = NodeBase & {
  readonly kind: "Return";
  readonly value: Expression;
};

export type If = NodeBase & {
  readonly kind: "If";
  readonly condition: Expression;
  readonly thenBranch: readonly Statement[];
  /** null when there is no `else`. */
  readonly elseBranch: readonly Statement[] | null;
};

export type LetDecl = NodeBase & {
  readonly kind: "LetDecl";
  readonly name: string;
  readonly varType: VarType;
  readonly init: Expression | null;
};

export type Block = NodeBase & {
  readonly kind: "Block";
  readonly statements: readonly Statement[];
};

/** A bare expression used as a statement. */
export type ExpressionStatement = NodeBase & {
  readonly kind: "ExpressionStatement";
  readonly expression: Expression;
};

/* =========================================================
   Declarations / Program
   ========================================================= */

export type Param = {
  readonly name: string;
  readonly varType: VarType;
  readonly range: Range;
};

export type FunctionDecl = NodeBase & {
  readonly kind: "Function";
  readonly name: string;
  readonly returnType: VarType;
  readonly params: readonly Param[];
  readonly body: Block;
};

export type Program = NodeBase & {
  readonly kind: "Program";
  readonly functions: readonly FunctionDecl[];
};

export type Node = Expression | Statement | FunctionDecl | Program;

export type NodeKind = Node["kind"];

/* =========================================================
   Factory
   ========================================================= */

/** Freeze a freshly built node (and its child arrays). */
export function node<T extends Node>(fields: T): T {
  for (const value of Object.values(fields)) {
    if (Array.isArray(value)) Object.freeze(value);
  }
  Object.freeze(fields);
  return fields;
}

/* =========================================================
   Type guards
   ========================================================= */

const EXPRESSION_KINDS: ReadonlySet<string> = new Set([
  "IntLiteral",
  "FloatLiteral",
  "StringLiteral",
  "CharLiteral",
  "BoolLiteral",
  "VoidLiteral",
  "Variable",
  "Binary",
  "Call",
]);

export function isExpression(n: Node): n is Expression {
  return EXPRESSION_KINDS.has(n.kind);
}

/* =========================================================
   AST Walker (visitor pattern)
   ========================================================= */

type Handler<N> = (node: N, parent: Node | null) => void;

export type Visitor = Partial<{
  enter: Handler<Node>;
  leave: Handler<Node>;

  Program: Handler<Program>;
  Function: Handler<FunctionDecl>;

  Block: Handler<Block>;
  Return: Handler<Return>;
  If: Handler<If>;
  LetDecl: Handler<LetDecl>;
  ExpressionStatement: Handler<ExpressionStatement>;

  IntLiteral: Handler<IntLiteral>;
  FloatLiteral: Handler<FloatLiteral>;
  StringLiteral: Handler<StringLiteral>;
  CharLiteral: Handler<CharLiteral>;
  BoolLiteral: Handler<BoolLiteral>;
  VoidLiteral: Handler<VoidLiteral>;
  Variable: Handler<Variable>;
  Binary: Handler<Binary>;
  Call: Handler<Call>;
}>;

/** Depth-first, source-order walk. */
export function walkAst(root: Node, visitor: Visitor): void {
  const visitAll = (nodes: readonly Node[], parent: Node) => {
    for (const n of nodes) visitNode(n, parent);
  };

  const visitNode = (n: Node, parent: Node | null): void => {
    visitor.enter?.(n, parent);

    switch (n.kind) {
      case "Program":
        visitor.Program?.(n, parent);
        visitAll(n.functions, n);
        break;
      case "Function":
        visitor.Function?.(n, parent);
        visitNode(n.body, n);
        break;

      case "Block":
        visitor.Block?.(n, parent);
        visitAll(n.statements, n);
        break;
      case "Return":
        visitor.Return?.(n, parent);
        visitNode(n.value, n);
        break;
      case "If":
        visitor.If?.(n, parent);
        visitNode(n.condition, n);
        visitAll(n.thenBranch, n);
        if (n.elseBranch) visitAll(n.elseBranch, n);
        break;
      case "LetDecl":
        visitor.LetDecl?.(n, parent);
        if (n.init) visitNode(n.init, n);
        break;
      case "ExpressionStatement":
        visitor.ExpressionStatement?.(n, parent);
        visitNode(n.expression, n);
        break;

      case "Binary":
        visitor.Binary?.(n, parent);
        visitNode(n.left, n);
        visitNode(n.right, n);
        break;
      case "Call":
        visitor.Call?.(n, parent);
        visitAll(n.args, n);
        break;

      // Leaves
      case "IntLiteral":
        visitor.IntLiteral?.(n, parent);
        break;
      case "FloatLiteral":
        visitor.FloatLiteral?.(n, parent);
        break;
      case "StringLiteral":
        visitor.StringLiteral?.(n, parent);
        break;
      case "CharLiteral":
        visitor.CharLiteral?.(n, parent);
        break;
      case "BoolLiteral":
        visitor.BoolLiteral?.(n, parent);
        break;
      case "VoidLiteral":
        visitor.VoidLiteral?.(n, parent);
        break;
      case "Variable":
        visitor.Variable?.(n, parent);
        break;
    }

    visitor.leave?.(n, parent);
  };

  visitNode(root, null);
}
