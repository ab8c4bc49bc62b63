import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod";
import {
  CONFIG_FILE_NAME,
  DEFAULT_BRANCHES,
  DEFAULT_CACHE_DIR,
  DEFAULT_SOURCE_URL,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_PROFILE, PROFILES, type ProfileName } from "./gradle/sections.js";

export interface SurveyConfig {
  sourceUrl: string;
  cacheDir: string;
  branches: string[];
  profile: ProfileName;
  /** `owner/repo` → path of the Flutter app inside the repository */
  monorepos: Record<string, string>;
}

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  /** Directory searched for gradle-survey.yaml when no path is given. */
  cwd?: string;
}

export const MONOREPOS_FILE = fileURLToPath(new URL("../../config/monorepos.yaml", import.meta.url));

const repositoryKey = z.string().regex(/^[^/\s]+\/[^/\s]+$/, "expected <owner>/<repo>");

const monoreposSchema = z.record(repositoryKey, z.string().min(1));

const configFileSchema = z
  .object({
    sourceUrl: z.string().url().optional(),
    cacheDir: z.string().min(1).optional(),
    branches: z.array(z.string().min(1)).min(1).optional(),
    profile: z.enum(PROFILES).optional(),
    monorepos: monoreposSchema.optional(),
  })
  .strict();

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

async function readYaml(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  try {
    return parse(content) ?? {};
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), path);
  }
}

function normalizeMonorepos(entries: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, path] of Object.entries(entries)) {
    result[key] = path.replace(/^\/+|\/+$/g, "");
  }
  return result;
}

/**
 * Loads the bundled monorepo overrides.
 */
export async function loadMonorepos(path: string = MONOREPOS_FILE): Promise<Record<string, string>> {
  const parsed = monoreposSchema.safeParse(await readYaml(path));
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), path);
  }
  return normalizeMonorepos(parsed.data);
}

/**
 * Resolves the effective configuration: built-in defaults, then the bundled
 * monorepo list, then the user's gradle-survey.yaml if there is one.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SurveyConfig> {
  const config: SurveyConfig = {
    sourceUrl: DEFAULT_SOURCE_URL,
    cacheDir: DEFAULT_CACHE_DIR,
    branches: [...DEFAULT_BRANCHES],
    profile: DEFAULT_PROFILE,
    monorepos: await loadMonorepos(),
  };

  const path = options.configPath ?? join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let raw: unknown;
  try {
    raw = await readYaml(path);
  } catch (error) {
    if (isMissingFile(error)) {
      if (options.configPath) {
        throw new ConfigError("config file not found", path);
      }
      return config;
    }
    throw error;
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), path);
  }

  const { monorepos, ...overrides } = parsed.data;
  return {
    ...config,
    ...overrides,
    monorepos: { ...config.monorepos, ...normalizeMonorepos(monorepos ?? {}) },
  };
}
