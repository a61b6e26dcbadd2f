import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import {
  CONFIG_FILE_NAME,
  ConfigError,
  DEFAULT_CONFIG,
  findQuillProjectRoot,
  loadQuillConfig,
  normalizeConfig,
} from "../src/language/configuration";

describe("normalizeConfig", () => {
  it("keeps well-typed known fields only", () => {
    expect(
      normalizeConfig({
        name: "demo",
        tabSize: 2,
        log: { level: "debug" },
        diagnostics: { enabled: false, maxProblems: 0 },
        files: { extensions: [".ql", 3] },
        extra: true,
      })
    ).toEqual({
      name: "demo",
      tabSize: 2,
      log: { level: "debug" },
      diagnostics: { enabled: false },
      files: { extensions: [".ql"] },
    });
  });

  it("drops values of the wrong shape", () => {
    expect(normalizeConfig("nope")).toEqual({});
    expect(normalizeConfig([1, 2])).toEqual({});
    expect(normalizeConfig({ tabSize: -1, log: { level: "loud" }, name: 5 })).toEqual({});
  });
});

describe("loadQuillConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "quill-config-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("merges the project file over the defaults", async () => {
    await fs.promises.writeFile(
      path.join(dir, CONFIG_FILE_NAME),
      JSON.stringify({ tabSize: 8, log: { level: "warn" }, files: { extensions: ["qs", ".ql", "qs"] } })
    );

    const config = await loadQuillConfig(path.join(dir, "src", "main.ql"));

    expect(config).toEqual({
      name: DEFAULT_CONFIG.name,
      tabSize: 8,
      log: { level: "warn" },
      diagnostics: { enabled: true, maxProblems: 100 },
      files: { extensions: [".qs", ".ql"] },
      projectRoot: dir,
      configPath: path.join(dir, CONFIG_FILE_NAME),
    });
  });

  it("stops at a .git folder and uses the defaults when there is no config file", async () => {
    await fs.promises.mkdir(path.join(dir, ".git"));
    await fs.promises.mkdir(path.join(dir, "src"));

    const config = await loadQuillConfig(path.join(dir, "src"));

    expect(config.projectRoot).toBe(dir);
    expect(config.configPath).toBeNull();
    expect(config.tabSize).toBe(4);
    expect(config.files.extensions).toEqual([".ql"]);
    expect(await findQuillProjectRoot(path.join(dir, "src"))).toBe(dir);
  });

  it("rejects a config file that is not JSON", async () => {
    const configPath = path.join(dir, CONFIG_FILE_NAME);
    await fs.promises.writeFile(configPath, "{ tabSize: ");

    const err = await loadQuillConfig(path.join(dir, "main.ql")).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    if (err instanceof ConfigError) {
      expect(err.configPath).toBe(configPath);
      expect(err.message.startsWith(`Invalid JSON in ${configPath}: `)).toBe(true);
    }
  });
});
