import { Command, Flags } from "@oclif/core";
import { loadConfig } from "../lib/config.js";
import { fetchBuildFiles } from "../lib/discovery/index.js";
import { SurveyError } from "../lib/errors.js";
import { Output } from "../lib/output.js";

export default class Fetch extends Command {
  static description =
    "Download the build.gradle of every Flutter app linked from the source README into the local cache";

  static examples = [
    "<%= config.bin %> fetch",
    "<%= config.bin %> fetch --cache-dir ./build/files --force",
    "<%= config.bin %> fetch -v",
  ];

  static flags = {
    "cache-dir": Flags.string({
      description: "Directory the build files are written to (default: cacheDir from config)",
    }),
    "source-url": Flags.string({
      description: "README listing the projects (default: sourceUrl from config)",
    }),
    config: Flags.string({
      char: "c",
      description: "Path to a gradle-survey.yaml config file",
    }),
    force: Flags.boolean({
      char: "f",
      description: "Download again even if a file is already cached",
      default: false,
    }),
    verbose: Flags.boolean({
      char: "v",
      description: "Show every download and every repository without a build file",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Fetch);
    const out = new Output({ verbose: flags.verbose });

    try {
      const config = await loadConfig({ configPath: flags.config });
      const summary = await fetchBuildFiles(
        {
          ...config,
          cacheDir: flags["cache-dir"] ?? config.cacheDir,
          sourceUrl: flags["source-url"] ?? config.sourceUrl,
        },
        out,
        { force: flags.force }
      );
      out.fetchSummary(summary);
    } catch (error) {
      if (error instanceof SurveyError) this.error(error.message, { exit: 2 });
      throw error;
    }
  }
}
