// src/lsp/symbols.ts
//
// Quill Document Symbols
// ----------------------
// Outline / breadcrumbs / "Go to Symbol in File":
// - one symbol per function, in source order
// - children: its parameters, then every `let` in its body (nested blocks included)
//
// Returns a generic QuillSymbol model; server.ts maps it to LSP types.

import { walkAst, type FunctionDecl, type Program, type Range } from "../core/ast";

export type SymbolKind = "function" | "parameter" | "variable";

export type QuillSymbol = {
  name: string;
  kind: SymbolKind;

  range: Range;
  selectionRange: Range;

  detail?: string;
  children?: QuillSymbol[];
};

/* =========================================================
   Public API
   ========================================================= */

export function getDocumentSymbols(program: Program | null): QuillSymbol[] {
  if (!program) return [];
  return program.functions.map(symbolFromFunction);
}

/** "(a: Int, b: Int) -> Int" */
export function functionSignature(fn: FunctionDecl): string {
  const params = fn.params.map((p) => `${p.name}: ${p.varType}`).join(", ");
  return `(${params}) -> ${fn.returnType}`;
}

/* =========================================================
   Extraction
   ========================================================= */

function symbolFromFunction(fn: FunctionDecl): QuillSymbol {
  const children: QuillSymbol[] = fn.params.map((p): QuillSymbol => ({
    name: p.name,
    kind: "parameter",
    range: p.range,
    selectionRange: p.range,
    detail: p.varType,
  }));

  walkAst(fn.body, {
    LetDecl: (decl) => {
      children.push({
        name: decl.name,
        kind: "variable",
        range: decl.range,
        selectionRange: decl.range,
        detail: decl.varType,
      });
    },
  });

  return {
    name: fn.name,
    kind: "function",
    range: fn.range,
    selectionRange: fn.range,
    detail: functionSignature(fn),
    children,
  };
}
