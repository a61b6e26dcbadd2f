// src/runner/run.ts
//
// Quill Runner (CLI core)
// -----------------------
// `quill <file.ql> [--tokens] [--log-level <level>]`
//
// 1) resolve the path and load quill.config.json
// 2) analyzeText()  -> tokens + AST, or the first LexError/ParseError
// 3) print the token dump or the AST dump to stdout
//
// IO is injected so tests capture stdout/stderr without touching the process.
//
// Exit codes:
//   0  success
//   1  lexer or parser error (rendered to stderr)
//   2  usage error, unreadable file or broken config

import * as fs from "fs";

import { dumpProgram, dumpTokens } from "../core/dump";
import { loadQuillConfig, type ResolvedQuillConfig } from "../language/configuration";
import { analyzeText } from "../language/quill.language";
import { createLogger, isLogLevel, type LogLevel } from "../utils/logger";
import { hasExtension, resolveUserPath } from "../utils/paths";

/* =========================================================
   Public types
   ========================================================= */

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;

  readFile: (filePath: string) => Promise<string>;
  loadConfig: (filePath: string) => Promise<ResolvedQuillConfig>;

  cwd: string;
};

export type CliArgs = {
  file: string;
  tokens: boolean;
  logLevel: LogLevel | null;
};

export const EXIT_OK = 0;
export const EXIT_SOURCE_ERROR = 1;
export const EXIT_USAGE = 2;

export const USAGE = "Usage: quill <file.ql> [--tokens] [--log-level <level>]";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/* =========================================================
   Argument parsing
   ========================================================= */

/** Returns null for --help. */
export function parseArgs(argv: readonly string[]): CliArgs | null {
  let file: string | null = null;
  let tokens = false;
  let logLevel: LogLevel | null = null;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];

    if (a === "--help" || a === "-h") return null;

    if (a === "--tokens") {
      tokens = true;
      continue;
    }

    if (a === "--log-level") {
      const v = argv[++i];
      if (v === undefined) throw new UsageError("--log-level needs a value");
      if (!isLogLevel(v)) throw new UsageError(`unknown log level: ${v}`);
      logLevel = v;
      continue;
    }

    if (a.startsWith("-")) throw new UsageError(`unknown option: ${a}`);

    if (file !== null) throw new UsageError(`unexpected argument: ${a}`);
    file = a;
  }

  if (file === null) throw new UsageError("missing input file");
  return { file, tokens, logLevel };
}

/* =========================================================
   Main entrypoint
   ========================================================= */

export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let args: CliArgs | null;
  try {
    args = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    io.stderr(`quill: ${e.message}\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (!args) {
    io.stdout(`${USAGE}\n`);
    return EXIT_OK;
  }

  const filePath = resolveUserPath(args.file, { cwd: io.cwd });

  let config: ResolvedQuillConfig;
  try {
    config = await io.loadConfig(filePath);
  } catch (e) {
    io.stderr(`quill: ${errorMessage(e)}\n`);
    return EXIT_USAGE;
  }

  const log = createLogger({
    name: "quill",
    level: args.logLevel ?? config.log.level,
    timestamp: false,
    sink: {
      error: (m) => io.stderr(`${m}\n`),
      warn: (m) => io.stderr(`${m}\n`),
      info: (m) => io.stderr(`${m}\n`),
      debug: (m) => io.stderr(`${m}\n`),
    },
  });

  if (!hasExtension(filePath, config.files.extensions)) {
    log.warn(`${args.file} does not end in ${config.files.extensions.join(" or ")}`);
  }

  let source: string;
  try {
    source = await io.readFile(filePath);
  } catch (e) {
    io.stderr(`quill: cannot read ${args.file}: ${errorMessage(e)}\n`);
    return EXIT_USAGE;
  }

  const timer = log.time(args.file);
  const result = analyzeText(source, { tabSize: config.tabSize, logger: log });
  timer.end(result.timings);

  // Token dump only needs the lexer to succeed.
  if (args.tokens && result.tokens.length > 0) {
    io.stdout(`${dumpTokens(result.tokens)}\n`);
    return EXIT_OK;
  }

  if (result.program && !args.tokens) {
    io.stdout(`${dumpProgram(result.program)}\n`);
    return EXIT_OK;
  }

  if (result.error) {
    io.stderr(`${result.error.render()}\n`);
  }
  return EXIT_SOURCE_ERROR;
}

/* =========================================================
   Node IO
   ========================================================= */

export function createNodeIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readFile: (filePath) => fs.promises.readFile(filePath, "utf8"),
    loadConfig: (filePath) => loadQuillConfig(filePath),
    cwd: process.cwd(),
  };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
