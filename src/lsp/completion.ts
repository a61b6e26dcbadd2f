// src/lsp/completion.ts
//
// Quill Completions Engine
// ------------------------
// Takes source text, a cursor offset and the parsed program (if the document
// parses) and returns generic completion items; server.ts maps them to LSP.
//
// Context is read from the text left of the cursor:
//   - after `:` or `->`   -> type names only
//   - anywhere else       -> keywords, type names, functions in the document
//
// Items are filtered by the identifier prefix under the cursor.
//
// Exports:
//   - getCompletions(req)

import { VAR_TYPES, type Program } from "../core/ast";
import { functionSignature } from "./symbols";

export type CompletionKind = "keyword" | "type" | "function" | "snippet" | "value";

export type CompletionItem = {
  label: string;
  kind: CompletionKind;
  detail?: string;
  insertText?: string;
  sortText?: string;
};

export type CompletionRequest = {
  source: string;
  offset: number;

  // null when the document does not parse
  program: Program | null;

  maxItems?: number;
};

const KEYWORDS = ["fn", "let", "if", "else", "return"] as const;
const BOOL_VALUES = ["true", "false"] as const;

export function getCompletions(req: CompletionRequest): CompletionItem[] {
  const maxItems = req.maxItems ?? 200;

  const left = req.source.slice(0, Math.max(0, Math.min(req.offset, req.source.length)));
  const ctx = detectContext(left);

  const out: CompletionItem[] = [];

  if (ctx.kind === "type") {
    out.push(...typeItems());
  } else {
    out.push(...keywordItems());
    out.push(...valueItems());
    out.push(...typeItems());
    out.push(...functionItems(req));
    out.push(...snippetItems());
  }

  const filtered = out.filter((it) => it.label.startsWith(ctx.prefix));
  return limit(dedupe(filtered), maxItems);
}

/* =========================================================
   Context detection
   ========================================================= */

type DetectedContext = { kind: "type" | "general"; prefix: string };

function detectContext(leftOfCursor: string): DetectedContext {
  const m = leftOfCursor.match(/[A-Za-z_][A-Za-z0-9_]*$/);
  const prefix = m ? m[0] : "";
  const before = leftOfCursor.slice(0, leftOfCursor.length - prefix.length).replace(/\s+$/, "");

  if (before.endsWith(":") || before.endsWith("->")) return { kind: "type", prefix };
  return { kind: "general", prefix };
}

/* =========================================================
   Item sources
   ========================================================= */

function keywordItems(): CompletionItem[] {
  return KEYWORDS.map((k): CompletionItem => ({ label: k, kind: "keyword", insertText: k, sortText: `1_${k}` }));
}

function valueItems(): CompletionItem[] {
  return BOOL_VALUES.map((v): CompletionItem => ({ label: v, kind: "value", detail: "Bool", sortText: `2_${v}` }));
}

function typeItems(): CompletionItem[] {
  return VAR_TYPES.map((t): CompletionItem => ({ label: t, kind: "type", detail: "primitive type", sortText: `3_${t}` }));
}

function functionItems(req: CompletionRequest): CompletionItem[] {
  if (req.program) {
    return req.program.functions.map((fn): CompletionItem => ({
      label: fn.name,
      kind: "function",
      detail: functionSignature(fn),
      insertText: `${fn.name}(`,
      sortText: `0_${fn.name}`,
    }));
  }

  // Document does not parse: fall back to scanning `fn <name>` headers.
  const out: CompletionItem[] = [];
  for (const m of req.source.matchAll(/\bfn\s+([A-Za-z_][A-Za-z0-9_]*)/g)) {
    out.push({ label: m[1], kind: "function", insertText: `${m[1]}(`, sortText: `0_${m[1]}` });
  }
  return out;
}

function snippetItems(): CompletionItem[] {
  return [
    {
      label: "fn main",
      kind: "snippet",
      insertText: "fn ${1:main}() -> ${2:Int} {\n    ${3:return 0;}\n}\n",
      detail: "Function declaration",
    },
    {
      label: "if / else",
      kind: "snippet",
      insertText: "if ${1:condition} {\n    ${2}\n} else {\n    ${3}\n}\n",
      detail: "Control flow",
    },
  ];
}

/* =========================================================
   Helpers
   ========================================================= */

function dedupe(items: CompletionItem[]): CompletionItem[] {
  const seen = new Set<string>();
  const out: CompletionItem[] = [];
  for (const it of items) {
    const key = `${it.kind}|${it.label}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(it);
  }
  return out;
}

function limit(items: CompletionItem[], max: number): CompletionItem[] {
  if (items.length <= max) return items;
  return items.slice(0, max);
}
