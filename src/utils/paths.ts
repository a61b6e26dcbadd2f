// src/utils/paths.ts
//
// Quill Paths Helpers
// -------------------
// Path utilities shared by the CLI, the config loader and the language server.

import * as path from "path";
import * as os from "os";
import * as fs from "fs";

export type ResolvePathEnv = {
  cwd: string;
  homeDir?: string;
};

/**
 * Resolve user-provided path into an absolute filesystem path.
 * Supports:
 * - relative paths (resolved from cwd)
 * - absolute paths
 * - "~" home expansion
 */
export function resolveUserPath(userPath: string, env: ResolvePathEnv): string {
  const p = userPath.trim();
  if (!p) return env.cwd;

  if (p === "~" || p.startsWith("~/")) {
    const home = env.homeDir ?? os.homedir();
    return path.resolve(home, p.slice(2));
  }

  if (path.isAbsolute(p)) return p;

  return path.resolve(env.cwd, p);
}

/** True when the file name ends with one of `extensions` (".ql" style). */
export function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath);
  return extensions.includes(ext);
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
