// src/lsp/server.ts
//
// Quill Language Server (LSP)
// ---------------------------
// Provides, per open document:
// - Diagnostics (lexer + parser; fail fast, so at most one)
// - Document symbols (functions, parameters, locals)
// - Completions (keywords, type names, functions in the document)
//
// createQuillServer() wires handlers onto a connection; lsp/main.ts creates the
// stdio connection and starts listening. The converters below are exported for
// tests.
//
// Core positions are 1-based with tab-stop columns; LSP positions are 0-based
// UTF-16 offsets. Every range goes through toLspRange().

import {
  CompletionItemKind,
  DiagnosticSeverity,
  InsertTextFormat,
  SymbolKind as LspSymbolKind,
  TextDocuments,
  TextDocumentSyncKind,
  type CompletionItem as LspCompletionItem,
  type Connection,
  type Diagnostic as LspDiagnostic,
  type DocumentSymbol,
  type InitializeResult,
  type Position as LspPosition,
  type Range as LspRange,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

import type { Position, Range } from "../core/ast";
import type { Diagnostic } from "../diagnostics/errors";
import { nextTabStop } from "../diagnostics/format";
import { DEFAULT_CONFIG, loadQuillConfig, type ResolvedQuillConfig } from "../language/configuration";
import { analyzeText, type QuillLanguageResult } from "../language/quill.language";
import { createLogger, type Logger } from "../utils/logger";
import { getCompletions, type CompletionItem } from "./completion";
import { getDocumentSymbols, type QuillSymbol } from "./symbols";

/* =========================================================
   Per-document cache
   ========================================================= */

type DocCache = {
  version: number;
  result: QuillLanguageResult;
  config: ResolvedQuillConfig;
  lines: string[];
};

export type QuillServerOptions = {
  logger?: Logger;
};

/* =========================================================
   Server wiring
   ========================================================= */

export function createQuillServer(connection: Connection, options: QuillServerOptions = {}): void {
  const documents = new TextDocuments(TextDocument);
  const cache = new Map<string, DocCache>();

  const log =
    options.logger ??
    createLogger({
      name: "quill-lsp",
      timestamp: false,
      sink: {
        error: (m) => connection.console.error(m),
        warn: (m) => connection.console.warn(m),
        info: (m) => connection.console.info(m),
        debug: (m) => connection.console.log(m),
      },
    });

  connection.onInitialize((): InitializeResult => {
    return {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Full,
        completionProvider: {
          resolveProvider: false,
          triggerCharacters: [":", ">"],
        },
        documentSymbolProvider: true,
      },
    };
  });

  // Project config may have changed: drop everything and revalidate.
  connection.onDidChangeConfiguration(async () => {
    cache.clear();
    for (const doc of documents.all()) {
      await validateTextDocument(doc);
    }
  });

  documents.onDidClose(async (e) => {
    cache.delete(e.document.uri);
    await connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
  });

  documents.onDidChangeContent(async (change) => {
    await validateTextDocument(change.document);
  });

  connection.onDocumentSymbol(async (params) => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return [];

    const entry = await analyzeWithCache(doc);
    return getDocumentSymbols(entry.result.program).map((s) => toLspSymbol(s, entry.lines, entry.config.tabSize));
  });

  connection.onCompletion(async (params) => {
    const doc = documents.get(params.textDocument.uri);
    if (!doc) return [];

    const entry = await analyzeWithCache(doc);
    const items = getCompletions({
      source: doc.getText(),
      offset: doc.offsetAt(params.position),
      program: entry.result.program,
      maxItems: 250,
    });

    return items.map(toLspCompletionItem);
  });

  /* ---------- diagnostics pipeline ---------- */

  async function validateTextDocument(doc: TextDocument): Promise<void> {
    try {
      const entry = await analyzeWithCache(doc);

      if (!entry.config.diagnostics.enabled) {
        await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
        return;
      }

      const diagnostics = entry.result.diagnostics
        .slice(0, entry.config.diagnostics.maxProblems)
        .map((d) => toLspDiagnostic(d, entry.lines, entry.config.tabSize));

      await connection.sendDiagnostics({ uri: doc.uri, diagnostics });
    } catch (e) {
      log.error(`validateTextDocument failed for ${doc.uri}: ${e instanceof Error ? e.message : String(e)}`);
      await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
    }
  }

  async function analyzeWithCache(doc: TextDocument): Promise<DocCache> {
    const existing = cache.get(doc.uri);
    if (existing && existing.version === doc.version) return existing;

    const config = await resolveConfig(doc.uri);
    log.setLevel(config.log.level);

    const text = doc.getText();
    const result = analyzeText(text, { tabSize: config.tabSize, logger: log });

    const entry: DocCache = { version: doc.version, result, config, lines: splitLines(text) };
    cache.set(doc.uri, entry);
    return entry;
  }

  async function resolveConfig(uri: string): Promise<ResolvedQuillConfig> {
    const parsed = URI.parse(uri);
    if (parsed.scheme !== "file") return { ...DEFAULT_CONFIG, projectRoot: null, configPath: null };

    try {
      return await loadQuillConfig(parsed.fsPath);
    } catch (e) {
      // keep defaults
      log.warn(`config load failed for ${parsed.fsPath}: ${e instanceof Error ? e.message : String(e)}`);
      return { ...DEFAULT_CONFIG, projectRoot: null, configPath: null };
    }
  }

  documents.listen(connection);
}

/* =========================================================
   Converters
   ========================================================= */

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** Core position (1-based, tab-stop column) -> LSP position (0-based, UTF-16). */
export function toLspPosition(pos: Position, lines: readonly string[], tabSize: number): LspPosition {
  const line = Math.max(0, pos.line - 1);
  const text = line < lines.length ? lines[line] : "";
  const target = Math.max(0, pos.column - 1);

  let visual = 0;
  for (let i = 0; i < text.length; i++) {
    if (visual >= target) return { line, character: i };
    visual = text[i] === "\t" ? nextTabStop(visual, tabSize) : visual + 1;
  }

  return { line, character: text.length };
}

export function toLspRange(range: Range, lines: readonly string[], tabSize: number): LspRange {
  return {
    start: toLspPosition(range.start, lines, tabSize),
    end: toLspPosition(range.end, lines, tabSize),
  };
}

export function toLspDiagnostic(d: Diagnostic, lines: readonly string[], tabSize: number): LspDiagnostic {
  return {
    severity: toLspSeverity(d.severity),
    range: toLspRange(d.range, lines, tabSize),
    message: d.message,
    code: d.code,
    source: d.source ? `quill-${d.source}` : "quill",
  };
}

function toLspSeverity(sev: Diagnostic["severity"]): DiagnosticSeverity {
  switch (sev) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
    case "info":
      return DiagnosticSeverity.Information;
  }
}

export function toLspSymbol(s: QuillSymbol, lines: readonly string[], tabSize: number): DocumentSymbol {
  return {
    name: s.name,
    detail: s.detail,
    kind: toLspSymbolKind(s.kind),
    range: toLspRange(s.range, lines, tabSize),
    selectionRange: toLspRange(s.selectionRange, lines, tabSize),
    children: s.children?.map((c) => toLspSymbol(c, lines, tabSize)),
  };
}

function toLspSymbolKind(kind: QuillSymbol["kind"]): LspSymbolKind {
  switch (kind) {
    case "function":
      return LspSymbolKind.Function;
    case "parameter":
      return LspSymbolKind.Variable;
    case "variable":
      return LspSymbolKind.Variable;
  }
}

export function toLspCompletionItem(item: CompletionItem): LspCompletionItem {
  return {
    label: item.label,
    kind: toLspCompletionKind(item.kind),
    detail: item.detail,
    insertText: item.insertText ?? item.label,
    insertTextFormat: item.kind === "snippet" ? InsertTextFormat.Snippet : InsertTextFormat.PlainText,
    sortText: item.sortText,
  };
}

function toLspCompletionKind(kind: CompletionItem["kind"]): CompletionItemKind {
  switch (kind) {
    case "keyword":
      return CompletionItemKind.Keyword;
    case "type":
      return CompletionItemKind.TypeParameter;
    case "function":
      return CompletionItemKind.Function;
    case "snippet":
      return CompletionItemKind.Snippet;
    case "value":
      return CompletionItemKind.Value;
  }
}
