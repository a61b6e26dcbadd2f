// src/diagnostics/errors.ts
//
// Quill errors + diagnostics model
// --------------------------------
// The lexer and parser fail fast: the first malformed token or construct
// throws. This module holds:
// - LexError / ParseError (thrown by the core)
// - Diagnostic (the shape the language service, CLI and LSP consume)
// - converters between the two
//
// Positions are 1-based (line and column), matching what the lexer records.

import { renderCaret, DEFAULT_TAB_SIZE } from "./format";

export type Severity = "error" | "warning" | "info";

export type Position = {
  line: number; // 1-based
  column: number; // 1-based
};

export type Range = {
  start: Position;
  end: Position;
};

export type DiagnosticSource = "lexer" | "parser";

export type Diagnostic = {
  severity: Severity;
  code: string; // stable ID, e.g. "LEX_ERROR"
  message: string;
  range: Range;
  source?: DiagnosticSource;
};

/* =========================================================
   Error classes
   ========================================================= */

export abstract class QuillError extends Error {
  public readonly line: number;
  public readonly col: number;

  protected constructor(message: string, line: number, col: number) {
    super(message);
    this.name = new.target.name;
    this.line = line;
    this.col = col;
  }

  /** Human-readable form printed by the CLI. */
  public abstract render(): string;
}

export class LexError extends QuillError {
  /** Full text of the source line containing the fault (no newline). */
  public readonly sourceLine: string;
  public readonly tabSize: number;

  constructor(message: string, line: number, col: number, sourceLine = "", tabSize = DEFAULT_TAB_SIZE) {
    super(message, line, col);
    this.sourceLine = sourceLine;
    this.tabSize = tabSize;
  }

  public render(): string {
    const head = `Lexer error at line ${this.line}, col ${this.col}: ${this.message}`;
    if (!this.sourceLine) return head;
    return `${head}\n${renderCaret(this.sourceLine, this.col, this.tabSize)}`;
  }
}

export class ParseError extends QuillError {
  constructor(message: string, line: number, col: number) {
    super(message, line, col);
  }

  public render(): string {
    return `Parse error at line ${this.line}, col ${this.col}: ${this.message}`;
  }
}

export function isQuillError(e: unknown): e is QuillError {
  return e instanceof QuillError;
}

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: string,
  message: string,
  range: Range,
  source?: DiagnosticSource
): Diagnostic {
  return { severity, code, message, range, source };
}

export function error(code: string, message: string, range: Range, source?: DiagnosticSource): Diagnostic {
  return diag("error", code, message, range, source);
}

/**
 * Convert a thrown core error into a Diagnostic. Anything that is not a
 * LexError/ParseError is rethrown.
 */
export function toDiagnostic(e: unknown, width = 1): Diagnostic {
  if (e instanceof LexError) {
    return error("LEX_ERROR", e.message, pointRange(e.line, e.col, width), "lexer");
  }
  if (e instanceof ParseError) {
    return error("PARSE_ERROR", e.message, pointRange(e.line, e.col, width), "parser");
  }
  throw e;
}

/* =========================================================
   Sorting
   ========================================================= */

export function sortDiagnostics(list: Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    if (a.range.start.line !== b.range.start.line) return a.range.start.line - b.range.start.line;
    if (a.range.start.column !== b.range.start.column) return a.range.start.column - b.range.start.column;
    return a.code.localeCompare(b.code);
  });
}

/* =========================================================
   Range utils
   ========================================================= */

export function pointRange(line: number, column: number, width = 1): Range {
  return {
    start: { line, column },
    end: { line, column: column + Math.max(0, width) },
  };
}

/* =========================================================
   Pretty printing
   ========================================================= */

export function formatDiagnostic(d: Diagnostic): string {
  const loc = `${d.range.start.line}:${d.range.start.column}`;
  const src = d.source ? `[${d.source}] ` : "";
  return `${d.severity.toUpperCase()} ${src}${d.code} @ ${loc}: ${d.message}`;
}

export function formatDiagnostics(list: Diagnostic[]): string {
  return sortDiagnostics(list).map(formatDiagnostic).join("\n");
}
