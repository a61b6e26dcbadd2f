// src/language/quill.language.ts
//
// Quill Language Service (high-level)
// -----------------------------------
// Single entrypoint for tools that want a result object instead of a throw:
// the LSP server and the CLI call this, never the lexer/parser directly.
//
// Pipeline:
//   - Lex   (tokenize; the list is also returned for --tokens and LSP tooling)
//   - Parse (parseTokens over that same list, so the source is lexed once)
//
// Both stages fail fast, so a result carries at most one diagnostic.
// Errors other than LexError/ParseError are not caught here.

import type { Program } from "../core/ast";
import { tokenize, type Token } from "../core/lexer";
import { parseTokens } from "../core/parser";
import { toDiagnostic, type Diagnostic, type QuillError, isQuillError } from "../diagnostics/errors";
import type { Logger } from "../utils/logger";

/* =========================================================
   Public types
   ========================================================= */

export type QuillLanguageOptions = {
  tabSize?: number;
  logger?: Logger;
};

export type QuillLanguageStageTimings = {
  lexMs: number;
  parseMs: number;
  totalMs: number;
};

export type QuillLanguageResult = {
  ok: boolean;

  tokens: Token[];
  program: Program | null;

  // The thrown error, when a stage failed
  error: QuillError | null;
  diagnostics: Diagnostic[];

  timings: QuillLanguageStageTimings;
};

/* =========================================================
   Main entrypoint
   ========================================================= */

export function analyzeText(source: string, options: QuillLanguageOptions = {}): QuillLanguageResult {
  const log = options.logger;
  const lexerOptions = { tabSize: options.tabSize };
  const started = performance.now();

  let tokens: Token[] = [];
  let program: Program | null = null;
  let error: QuillError | null = null;

  // -------- LEX --------
  const t0 = performance.now();
  try {
    tokens = tokenize(source, lexerOptions);
  } catch (e) {
    error = asQuillError(e);
  }
  const lexMs = performance.now() - t0;

  // -------- PARSE --------
  const t1 = performance.now();
  if (!error) {
    try {
      program = parseTokens(tokens);
    } catch (e) {
      error = asQuillError(e);
    }
  }
  const parseMs = performance.now() - t1;

  const totalMs = performance.now() - started;
  log?.debug("analyzed", { tokens: tokens.length, ok: !error, lexMs, parseMs });

  return {
    ok: error === null,
    tokens,
    program,
    error,
    diagnostics: error ? [toDiagnostic(error)] : [],
    timings: { lexMs, parseMs, totalMs },
  };
}

function asQuillError(e: unknown): QuillError {
  if (isQuillError(e)) return e;
  throw e;
}
