import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { SurveyConfig } from "../config.js";
import { README_CACHE_NAME } from "../constants.js";
import { DownloadError, errorMessage } from "../errors.js";
import type { Output } from "../output.js";
import { downloadFile } from "./download.js";
import { extractRepositoryLinks } from "./readme-links.js";
import { buildFileCandidates, parseGitHubRepository } from "./repositories.js";

export { downloadFile } from "./download.js";
export { extractRepositoryLinks } from "./readme-links.js";
export { buildFileCandidates, parseGitHubRepository } from "./repositories.js";

export interface FetchOptions {
  force?: boolean;
}

export interface FetchFailure {
  link: string;
  reason: string;
}

export interface FetchSummary {
  /** Cache paths of build files now available locally */
  downloaded: string[];
  /** Repository links with no build file on any branch */
  missing: string[];
  /** Links that are not GitHub repositories */
  skipped: string[];
  /** Repositories where every attempt ended in a network error */
  failed: FetchFailure[];
}

/**
 * Populates the cache: downloads the README, then each linked repository's
 * build file from the first branch that has one.
 */
export async function fetchBuildFiles(
  config: SurveyConfig,
  out: Output,
  options: FetchOptions = {}
): Promise<FetchSummary> {
  const readmePath = join(config.cacheDir, README_CACHE_NAME);
  if (!(await downloadFile(config.sourceUrl, readmePath, { force: options.force }))) {
    throw new DownloadError(config.sourceUrl);
  }

  const links = extractRepositoryLinks(await readFile(readmePath, "utf-8"));
  out.info(`Found ${links.length} project links`);

  const summary: FetchSummary = { downloaded: [], missing: [], skipped: [], failed: [] };

  for (const link of links) {
    const repository = parseGitHubRepository(link);
    if (!repository) {
      out.debug(`Not a GitHub repository: ${link}`);
      summary.skipped.push(link);
      continue;
    }

    const target = buildFileCandidates(repository, config);
    let found = false;
    let lastError: string | undefined;

    for (const candidate of target.candidates) {
      try {
        if (await downloadFile(candidate.url, target.cachePath, { force: options.force })) {
          found = true;
          break;
        }
      } catch (error) {
        lastError = errorMessage(error);
        out.debug(`${candidate.url}: ${lastError}`);
      }
    }

    if (found) {
      out.downloaded(target.cachePath);
      summary.downloaded.push(target.cachePath);
    } else if (lastError !== undefined) {
      out.warn(`Could not fetch ${link}: ${lastError}`);
      summary.failed.push({ link, reason: lastError });
    } else {
      out.debug(`build.gradle not found for ${link}`);
      summary.missing.push(link);
    }
  }

  return summary;
}
