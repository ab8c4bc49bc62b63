import fg from "fast-glob";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage } from "../errors.js";
import { scanSections } from "./scanner.js";
import { createRegistry, DEFAULT_PROFILE, type ProfileName } from "./sections.js";

export interface CachedFile {
  path: string;
  text: string;
}

export interface ReadFailure {
  path: string;
  reason: string;
}

export interface FileScanResult {
  path: string;
  matched: string[];
  complete: boolean;
}

export interface SequenceCount {
  sequence: string[];
  count: number;
}

export interface SurveySummary {
  files: number;
  complete: number;
  incomplete: number;
  /** Files in which each section id was matched at least once. */
  sectionHits: Record<string, number>;
  /** Distinct matched sequences, most frequent first. */
  sequences: SequenceCount[];
}

/**
 * Reads every cached file under `dir` matching `pattern` as strict UTF-8,
 * with `\r\n` and lone `\r` line endings turned into `\n`. Files that cannot
 * be read or decoded are returned as failures and left out of `files`.
 */
export async function readCachedFiles(
  dir: string,
  pattern: string
): Promise<{ files: CachedFile[]; failures: ReadFailure[] }> {
  const paths = await fg(pattern, { cwd: dir, onlyFiles: true, dot: false });
  paths.sort();

  const decoder = new TextDecoder("utf-8", { fatal: true });
  const files: CachedFile[] = [];
  const failures: ReadFailure[] = [];

  for (const relativePath of paths) {
    const path = join(dir, relativePath);
    try {
      const bytes = await readFile(path);
      files.push({ path, text: decoder.decode(bytes).replace(/\r\n?/g, "\n") });
    } catch (error) {
      failures.push({ path, reason: errorMessage(error) });
    }
  }

  return { files, failures };
}

/**
 * Scans each file with its own registry. Results keep the input order.
 */
export function surveyFiles(files: CachedFile[], profile: ProfileName = DEFAULT_PROFILE): FileScanResult[] {
  return files.map(({ path, text }) => {
    const { matched, complete } = scanSections(createRegistry(profile), text);
    return { path, matched, complete };
  });
}

export function summarizeSurvey(results: FileScanResult[]): SurveySummary {
  const sectionHits: Record<string, number> = {};
  const sequences = new Map<string, SequenceCount>();
  let complete = 0;

  for (const result of results) {
    if (result.complete) complete++;

    for (const id of new Set(result.matched)) {
      sectionHits[id] = (sectionHits[id] ?? 0) + 1;
    }

    const key = result.matched.join(",");
    const entry = sequences.get(key);
    if (entry) {
      entry.count++;
    } else {
      sequences.set(key, { sequence: result.matched, count: 1 });
    }
  }

  return {
    files: results.length,
    complete,
    incomplete: results.length - complete,
    sectionHits,
    // Stable sort keeps first-seen order among equal counts
    sequences: [...sequences.values()].sort((a, b) => b.count - a.count),
  };
}
