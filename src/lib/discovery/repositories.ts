import { join } from "node:path";
import { BUILD_FILE_PATH, RAW_GITHUB_BASE, cacheFileName } from "../constants.js";

export interface GitHubRepository {
  owner: string;
  name: string;
}

export interface BuildFileCandidate {
  branch: string;
  url: string;
}

export interface BuildFileTarget {
  repository: GitHubRepository;
  /** Raw URLs to try, in branch order */
  candidates: BuildFileCandidate[];
  /** Where the downloaded file is cached */
  cachePath: string;
}

export interface CandidateOptions {
  branches: string[];
  cacheDir: string;
  monorepos: Record<string, string>;
}

/**
 * Parses `https://github.com/<owner>/<repo>[/...]`. Any other link yields null.
 */
export function parseGitHubRepository(link: string): GitHubRepository | null {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }
  if (url.hostname !== "github.com" && url.hostname !== "www.github.com") {
    return null;
  }

  const [owner, name] = url.pathname.split("/").filter((segment) => segment.length > 0);
  if (!owner || !name) return null;

  return { owner, name: name.replace(/\.git$/, "") };
}

export function repositoryKey(repository: GitHubRepository): string {
  return `${repository.owner}/${repository.name}`;
}

/**
 * Lists where a repository's Flutter build file may live, honouring the
 * subdirectory overrides for repositories that are not a single app.
 */
export function buildFileCandidates(repository: GitHubRepository, options: CandidateOptions): BuildFileTarget {
  const appDir = options.monorepos[repositoryKey(repository)];
  const filePath = appDir ? `${appDir}/${BUILD_FILE_PATH}` : BUILD_FILE_PATH;

  return {
    repository,
    candidates: options.branches.map((branch) => ({
      branch,
      url: `${RAW_GITHUB_BASE}/${repository.owner}/${repository.name}/${branch}/${filePath}`,
    })),
    cachePath: join(options.cacheDir, cacheFileName(repository.owner, repository.name)),
  };
}
