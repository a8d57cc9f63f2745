import type { Outcome, TestPath } from "../core/model.js";
import { renderErrorReport } from "../report/format.js";
import { failureLine } from "./classify.js";

export interface ErrorLogOptions {
  description: (path: TestPath) => string;
  outputFile: (path: TestPath) => string;
  verbose: boolean;
}

/**
 * Rendered reports of failing tests, most recent first.
 * Appended to only by the running strategy, read once the run is over.
 */
export class ErrorLog {
  private readonly reports: string[] = [];

  constructor(private readonly options: ErrorLogOptions) {}

  record(path: TestPath, outcome: Outcome): void {
    const error = failureLine(outcome);
    if (error === null) return;

    this.reports.unshift(
      renderErrorReport({
        path,
        description: this.options.description(path),
        error,
        file: this.options.outputFile(path),
        verbose: this.options.verbose,
      })
    );
  }

  /** Most recent first. */
  all(): readonly string[] {
    return this.reports;
  }

  latest(): string | undefined {
    return this.reports[0];
  }

  get size(): number {
    return this.reports.length;
  }
}
