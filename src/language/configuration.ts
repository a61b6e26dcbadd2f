// src/language/configuration.ts
//
// Quill Project Configuration Resolver
// ------------------------------------
// Reads "quill.config.json" from the project root and returns one normalized
// config object used by the CLI and the language server.
//
// Project root: the nearest directory (walking up from the source file) that
// holds quill.config.json or a .git folder.
//
// Exports:
//   - QuillConfig / ResolvedQuillConfig (types)
//   - loadQuillConfig(filePath, workspaceRoot?): Promise<ResolvedQuillConfig>
//   - findQuillProjectRoot(startDir): Promise<string | null>
//   - normalizeConfig(raw): QuillConfig

import * as fs from "fs";
import * as path from "path";

import { isLogLevel, type LogLevel } from "../utils/logger";
import { exists } from "../utils/paths";

export const CONFIG_FILE_NAME = "quill.config.json";

export type QuillConfig = {
  // Name shown in logs
  name?: string;

  // Tab stop width for column tracking and caret rendering
  tabSize?: number;

  log?: {
    level?: LogLevel;
  };

  diagnostics?: {
    enabled?: boolean;
    // Upper bound on diagnostics published per document
    maxProblems?: number;
  };

  files?: {
    // Which file extensions are treated as Quill source
    extensions?: string[];
  };
};

export type ResolvedQuillConfig = {
  name: string;
  tabSize: number;
  log: { level: LogLevel };
  diagnostics: { enabled: boolean; maxProblems: number };
  files: { extensions: string[] };

  projectRoot: string | null;
  configPath: string | null;
};

export const DEFAULT_CONFIG: Omit<ResolvedQuillConfig, "projectRoot" | "configPath"> = {
  name: "Quill Project",
  tabSize: 4,
  log: { level: "info" },
  diagnostics: { enabled: true, maxProblems: 100 },
  files: { extensions: [".ql"] },
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/* =========================================================
   Public API
   ========================================================= */

export async function loadQuillConfig(filePath: string, workspaceRoot?: string): Promise<ResolvedQuillConfig> {
  const startDir = (await isDirectory(filePath)) ? filePath : path.dirname(filePath);

  const projectRoot = (await findQuillProjectRoot(startDir)) ?? workspaceRoot ?? null;
  const configPath = projectRoot ? await findConfigFile(projectRoot) : null;

  const user = configPath ? normalizeConfig(await readJson(configPath)) : {};

  return {
    name: user.name ?? DEFAULT_CONFIG.name,
    tabSize: user.tabSize ?? DEFAULT_CONFIG.tabSize,
    log: { level: user.log?.level ?? DEFAULT_CONFIG.log.level },
    diagnostics: {
      enabled: user.diagnostics?.enabled ?? DEFAULT_CONFIG.diagnostics.enabled,
      maxProblems: user.diagnostics?.maxProblems ?? DEFAULT_CONFIG.diagnostics.maxProblems,
    },
    files: {
      extensions: uniqueStrings((user.files?.extensions ?? DEFAULT_CONFIG.files.extensions).map(normalizeExt)),
    },
    projectRoot,
    configPath,
  };
}

export async function findQuillProjectRoot(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  while (true) {
    if (await exists(path.join(dir, CONFIG_FILE_NAME))) return dir;
    if (await exists(path.join(dir, ".git"))) return dir;

    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Keep only well-typed known fields of a parsed config file.
 * Unknown keys and values of the wrong type are dropped.
 */
export function normalizeConfig(raw: unknown): QuillConfig {
  if (!isObject(raw)) return {};

  const out: QuillConfig = {};

  if (typeof raw.name === "string") out.name = raw.name;
  if (isPositiveInt(raw.tabSize)) out.tabSize = raw.tabSize;

  if (isObject(raw.log) && typeof raw.log.level === "string" && isLogLevel(raw.log.level)) {
    out.log = { level: raw.log.level };
  }

  if (isObject(raw.diagnostics)) {
    const d = raw.diagnostics;
    out.diagnostics = {};
    if (typeof d.enabled === "boolean") out.diagnostics.enabled = d.enabled;
    if (isPositiveInt(d.maxProblems)) out.diagnostics.maxProblems = d.maxProblems;
  }

  if (isObject(raw.files) && Array.isArray(raw.files.extensions)) {
    out.files = {
      extensions: raw.files.extensions.filter((e): e is string => typeof e === "string"),
    };
  }

  return out;
}

/* =========================================================
   Config file discovery
   ========================================================= */

async function findConfigFile(projectRoot: string): Promise<string | null> {
  const p = path.join(projectRoot, CONFIG_FILE_NAME);
  return (await exists(p)) ? p : null;
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function readJson(p: string): Promise<unknown> {
  const raw = await fs.promises.readFile(p, "utf8");
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in ${p}: ${e instanceof Error ? e.message : String(e)}`, p);
  }
}

/* =========================================================
   Normalization helpers
   ========================================================= */

function isObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function isPositiveInt(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x > 0;
}

function uniqueStrings(list: string[]): string[] {
  const set = new Set<string>();
  for (const s of list) {
    const t = s.trim();
    if (t) set.add(t);
  }
  return [...set.values()];
}

function normalizeExt(ext: string): string {
  const e = ext.trim();
  if (!e) return ".ql";
  return e.startsWith(".") ? e : `.${e}`;
}
