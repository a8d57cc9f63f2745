import type { Outcome, RunConfig, RunObserver, RunSummary, Sink, TestPath } from "../core/model.js";
import { comparePaths } from "../core/path.js";
import { toMachineSummary } from "../core/summary.js";
import { formatPath, plural, STATUS_COLUMN, statusChar, statusTag } from "./format.js";

export interface ReporterOptions {
  out: Sink;
  config: Pick<RunConfig, "verbose" | "compact" | "showErrors" | "json">;
  /** Length of the longest group name */
  maxLabel: number;
  description: (path: TestPath) => string;
}

/**
 * Renders progress and the final summary. Reads events and summaries,
 * never outcomes of its own making.
 */
export class Reporter implements RunObserver {
  constructor(private readonly options: ReporterOptions) {}

  private print(text: string): void {
    if (!this.options.config.json) {
      this.options.out.write(text);
    }
  }

  private info(path: TestPath, separator = "   "): string {
    return `${formatPath(path, this.options.maxLabel)}${separator}${this.options.description(path)}`;
  }

  banner(name: string, runId: string): void {
    this.print(`Testing \`${name}\`.\nThis run has ID \`${runId}\`.\n`);
  }

  onStart(path: TestPath): void {
    if (this.options.config.compact) return;
    this.print(`${" ...".padEnd(STATUS_COLUMN)}${this.info(path)}`);
  }

  onResult(path: TestPath, outcome: Outcome): void {
    if (this.options.config.compact) {
      this.print(statusChar(outcome));
      return;
    }
    this.print(`\r${statusTag(outcome).padEnd(STATUS_COLUMN)}${this.info(path)}\n`);
  }

  /**
   * Final block of a run.
   *
   * @param errors - rendered error reports, most recent first
   * @param runDir - where the output files were written
   */
  summary(summary: RunSummary, errors: readonly string[], runDir: string): void {
    const { verbose, compact, showErrors, json } = this.options.config;

    if (json) {
      this.options.out.write(`${JSON.stringify(toMachineSummary(summary))}\n`);
      return;
    }

    if (compact) this.print("\n");

    if (summary.failed > 0 && errors.length > 0) {
      const shown = verbose || showErrors ? [...errors].reverse() : [errors[0]];
      for (const report of shown) {
        this.print(`${report}\n`);
      }
    }

    if (compact && summary.failed === 0) return;

    const fullLogs = verbose ? "" : `The full test results are available in \`${runDir}\`.\n`;
    const results =
      summary.failed === 0 ? "Test Successful" : `${summary.failed} error${plural(summary.failed)}!`;
    this.print(
      `${fullLogs}${results} in ${summary.time.toFixed(3)}s. ${summary.ran} test${plural(summary.ran)} run.\n`
    );
  }

  /**
   * Print every path with its description, sorted.
   */
  list(paths: readonly TestPath[]): void {
    for (const path of [...paths].sort(comparePaths)) {
      this.options.out.write(`${this.info(path, "    ")}\n`);
    }
  }
}
