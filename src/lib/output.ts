import chalk from "chalk";
import type { FetchSummary } from "./discovery/index.js";
import type { FileScanResult, ReadFailure, SurveySummary } from "./gradle/survey.js";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;
  private startTime: number;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
    this.startTime = Date.now();
  }

  // Startup messages
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  debug(msg: string): void {
    if (this.verbose) {
      console.log(chalk.dim(`  ${msg}`));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Section header
  header(title: string): void {
    console.log(chalk.cyan(title));
  }

  // List item (with failure marker)
  item(msg: string): void {
    console.log(chalk.red("  ✗") + " " + msg);
  }

  downloaded(path: string): void {
    if (this.verbose) {
      console.log(chalk.green("↓") + " " + chalk.cyan(path));
    }
  }

  // One line per scanned file
  scanResult(result: FileScanResult): void {
    const marker = result.complete ? chalk.green("✓") : chalk.red("✗");
    const sections = result.matched.length > 0 ? result.matched.join(", ") : chalk.dim("(none)");
    const status = result.complete ? "" : " " + chalk.red("[incomplete]");
    console.log(`${marker} ${result.path}: ${sections}${status}`);
  }

  readFailures(failures: ReadFailure[]): void {
    if (failures.length === 0) return;
    this.warn(`${failures.length} file(s) could not be read`);
    for (const failure of failures) {
      this.item(`${failure.path}: ${failure.reason}`);
    }
  }

  surveySummary(summary: SurveySummary, showSequences: boolean): void {
    console.log();
    this.header("━━━ Survey ━━━");
    console.log(`Files:      ${summary.files}`);
    console.log(`Complete:   ${summary.complete}`);
    console.log(`Incomplete: ${summary.incomplete}`);

    const ids = Object.keys(summary.sectionHits);
    if (ids.length > 0) {
      console.log("\nSections:");
      for (const id of ids) {
        console.log(`  ${id.padEnd(20)}${summary.sectionHits[id]}`);
      }
    }

    if (showSequences && summary.sequences.length > 0) {
      console.log("\nSequences:");
      for (const { sequence, count } of summary.sequences) {
        const label = sequence.length > 0 ? sequence.join(" → ") : "(none)";
        console.log(`  ${String(count).padStart(4)}  ${label}`);
      }
    }
  }

  incompleteFiles(results: FileScanResult[]): void {
    const incomplete = results.filter((result) => !result.complete);
    if (incomplete.length === 0) return;
    this.error(`${incomplete.length} file(s) missing a required section`);
  }

  fetchSummary(summary: FetchSummary): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    console.log();
    this.success(`Done. ${summary.downloaded.length} build files cached in ${elapsed}s.`);
    if (summary.missing.length > 0) {
      console.log(chalk.dim(`${summary.missing.length} repositories without android/app/build.gradle`));
    }
    if (summary.skipped.length > 0) {
      console.log(chalk.dim(`${summary.skipped.length} links skipped (not GitHub repositories)`));
    }
    if (summary.failed.length > 0) {
      this.warn(`${summary.failed.length} repositories failed`);
      for (const failure of summary.failed) {
        this.item(`${failure.link}: ${failure.reason}`);
      }
    }
  }
}
