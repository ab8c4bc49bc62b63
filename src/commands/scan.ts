import { Command, Flags } from "@oclif/core";
import { loadConfig } from "../lib/config.js";
import { SurveyError } from "../lib/errors.js";
import { PROFILES, isProfileName } from "../lib/gradle/sections.js";
import { readCachedFiles, summarizeSurvey, surveyFiles } from "../lib/gradle/survey.js";
import { GlobPatterns } from "../lib/constants.js";
import { Output } from "../lib/output.js";

export default class Scan extends Command {
  static description =
    "Report which known sections lead each cached build.gradle file and whether the required ones were found";

  static examples = [
    "<%= config.bin %> scan",
    "<%= config.bin %> scan --path ./build/files",
    "<%= config.bin %> scan --summary --sequences",
    "<%= config.bin %> scan --profile build-gradle-versions --json",
    "<%= config.bin %> scan --check",
  ];

  static flags = {
    path: Flags.string({
      char: "p",
      description: "Directory of cached build files (default: cacheDir from config)",
    }),
    pattern: Flags.string({
      description: "Glob selecting files inside the directory",
      default: GlobPatterns.cachedBuildFiles,
    }),
    profile: Flags.string({
      description: "Section profile to scan with (default: profile from config)",
      options: [...PROFILES],
    }),
    config: Flags.string({
      char: "c",
      description: "Path to a gradle-survey.yaml config file",
    }),
    json: Flags.boolean({
      description: "Print results as JSON",
      default: false,
    }),
    summary: Flags.boolean({
      char: "s",
      description: "Print totals and per-section counts after the file list",
      default: false,
    }),
    sequences: Flags.boolean({
      description: "Include the distinct section sequences in the summary",
      default: false,
    }),
    check: Flags.boolean({
      description: "Exit with code 1 if any file is missing a required section (for CI)",
      default: false,
    }),
    verbose: Flags.boolean({
      char: "v",
      description: "Show detailed output",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Scan);
    const out = new Output({ verbose: flags.verbose });

    const config = await loadConfig({ configPath: flags.config }).catch((error: unknown) => {
      if (error instanceof SurveyError) this.error(error.message, { exit: 2 });
      throw error;
    });

    const profileName = flags.profile ?? config.profile;
    if (!isProfileName(profileName)) {
      this.error(`Unknown profile: ${profileName}`, { exit: 2 });
    }
    const dir = flags.path ?? config.cacheDir;

    out.info(`Scanning ${dir} (${flags.pattern}) with profile ${profileName}`);
    const { files, failures } = await readCachedFiles(dir, flags.pattern);

    if (files.length === 0 && failures.length === 0) {
      console.log("No cached build files found.");
      console.log("Run 'gradle-survey fetch' first to populate the cache.");
      if (flags.check) {
        process.exit(1);
      }
      return;
    }

    const results = surveyFiles(files, profileName);
    const summary = summarizeSurvey(results);

    if (flags.json) {
      console.log(JSON.stringify({ profile: profileName, results, failures, summary }, null, 2));
    } else {
      for (const result of results) {
        out.scanResult(result);
      }
      out.readFailures(failures);
      if (flags.summary || flags.sequences) {
        out.surveySummary(summary, flags.sequences);
      }
    }

    if (flags.check && summary.incomplete > 0) {
      out.incompleteFiles(results);
      process.exit(1);
    }
  }
}
