/**
 * README listing open-source Flutter apps; its links are the survey corpus.
 */
export const DEFAULT_SOURCE_URL =
  "https://raw.githubusercontent.com/tortuvshin/open-source-flutter-apps/master/README.md";

export const DEFAULT_CACHE_DIR = "build/files";

/** Branches tried, in order, when looking for a repository's build file. */
export const DEFAULT_BRANCHES = ["main", "master", "develop"];

/** Optional per-project config file, looked up in the working directory. */
export const CONFIG_FILE_NAME = "gradle-survey.yaml";

export const README_CACHE_NAME = "source_readme.md";

export const RAW_GITHUB_BASE = "https://raw.githubusercontent.com";

/** Path of the Android app build script inside a Flutter project. */
export const BUILD_FILE_PATH = "android/app/build.gradle";

export const BUILD_FILE_SUFFIX = ".build.gradle";

export const GlobPatterns = {
  /** Cached build files written by `fetch` */
  cachedBuildFiles: `*${BUILD_FILE_SUFFIX}`,
} as const;

/**
 * Builds the cache file name for a repository, e.g. `owner_repo.build.gradle`.
 */
export function cacheFileName(owner: string, repo: string): string {
  return `${owner}_${repo}${BUILD_FILE_SUFFIX}`;
}
