import { describe, it, expect, beforeEach, vi } from "vitest";

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
}));

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { loadConfig, loadMonorepos, MONOREPOS_FILE } from "./config.js";
import { DEFAULT_BRANCHES, DEFAULT_CACHE_DIR, DEFAULT_SOURCE_URL } from "./constants.js";
import { ConfigError } from "./errors.js";

const BUNDLED = "roughike/inKino: mobile\nmemspace/zefyr: packages/zefyr/example/\n";

function enoent(): Error {
  return Object.assign(new Error("ENOENT: no such file or directory"), { code: "ENOENT" });
}

/** Serves the bundled monorepo list plus the given files; everything else is missing. */
function mockFiles(files: Record<string, string>): void {
  vi.mocked(readFile).mockImplementation((async (path: string) => {
    if (path === MONOREPOS_FILE) return BUNDLED;
    if (path in files) return files[path];
    throw enoent();
  }) as never);
}

describe("loadMonorepos", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("reads the bundled overrides and trims slashes", async () => {
    mockFiles({});
    expect(await loadMonorepos()).toEqual({
      "roughike/inKino": "mobile",
      "memspace/zefyr": "packages/zefyr/example",
    });
  });

  it("rejects keys that are not owner/repo", async () => {
    mockFiles({ "bad.yaml": "inKino: mobile\n" });
    await expect(loadMonorepos("bad.yaml")).rejects.toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("uses defaults when no config file exists", async () => {
    mockFiles({});
    const config = await loadConfig({ cwd: "/work" });

    expect(config).toEqual({
      sourceUrl: DEFAULT_SOURCE_URL,
      cacheDir: DEFAULT_CACHE_DIR,
      branches: DEFAULT_BRANCHES,
      profile: "build-gradle",
      monorepos: {
        "roughike/inKino": "mobile",
        "memspace/zefyr": "packages/zefyr/example",
      },
    });
  });

  it("applies gradle-survey.yaml from the working directory", async () => {
    mockFiles({
      [join("/work", "gradle-survey.yaml")]: [
        "cacheDir: cache/gradle",
        "branches: [trunk]",
        "profile: build-gradle-versions",
        "monorepos:",
        "  roughike/inKino: apps/mobile",
        "  someone/tools: flutter/",
      ].join("\n"),
    });

    const config = await loadConfig({ cwd: "/work" });

    expect(config.sourceUrl).toBe(DEFAULT_SOURCE_URL);
    expect(config.cacheDir).toBe("cache/gradle");
    expect(config.branches).toEqual(["trunk"]);
    expect(config.profile).toBe("build-gradle-versions");
    expect(config.monorepos).toEqual({
      "roughike/inKino": "apps/mobile",
      "memspace/zefyr": "packages/zefyr/example",
      "someone/tools": "flutter",
    });
  });

  it("accepts an empty config file", async () => {
    mockFiles({ "empty.yaml": "" });
    const config = await loadConfig({ configPath: "empty.yaml" });
    expect(config.cacheDir).toBe(DEFAULT_CACHE_DIR);
  });

  it("requires an explicit config file to exist", async () => {
    mockFiles({});
    await expect(loadConfig({ configPath: "missing.yaml" })).rejects.toThrow("missing.yaml: config file not found");
  });

  it("names the invalid field", async () => {
    mockFiles({ "c.yaml": "profile: settings-gradle\n" });
    await expect(loadConfig({ configPath: "c.yaml" })).rejects.toThrow(/^c\.yaml: profile: /);
  });

  it("rejects unknown keys", async () => {
    mockFiles({ "c.yaml": "cache_dir: x\n" });
    await expect(loadConfig({ configPath: "c.yaml" })).rejects.toThrow(ConfigError);
  });

  it("reports malformed YAML as a config error", async () => {
    mockFiles({ "c.yaml": "branches: [main\n" });
    await expect(loadConfig({ configPath: "c.yaml" })).rejects.toThrow(ConfigError);
  });
});
