// src/index.ts
//
// Quill Barrel Export
// -------------------
// Library entry point: one import for tools embedding the front end.
//
//   import { parseSource, dumpProgram } from "quill-lang";

export * from "./core/lexer";
export * from "./core/ast";
export * from "./core/parser";
export * from "./core/dump";
export {
  QuillError,
  LexError,
  ParseError,
  isQuillError,
  toDiagnostic,
  formatDiagnostic,
  formatDiagnostics,
  type Diagnostic,
  type DiagnosticSource,
  type Severity,
} from "./diagnostics/errors";
export * from "./diagnostics/format";
export * from "./language/configuration";
export * from "./language/quill.language";
export { createLogger, Logger, type LogLevel, type LoggerOptions } from "./utils/logger";
