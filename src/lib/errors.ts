/**
 * Error types raised by gradle-survey.
 *
 * Per-file scan outcomes are values, not exceptions. These classes cover the
 * failures that stop a command: a broken grammar, a bad config file, an
 * unreadable README or a download that must succeed.
 */

export class SurveyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A matcher or registry was built with invalid arguments. */
export class GrammarError extends SurveyError {}

export class ConfigError extends SurveyError {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(file ? `${file}: ${message}` : message);
  }
}

/** The repository README does not have the expected Contents/section layout. */
export class ReadmeFormatError extends SurveyError {}

export class DownloadError extends SurveyError {
  constructor(readonly url: string) {
    super(`Download failed: ${url}`);
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
