/**
 * Text rendering shared by the reporter and the error log.
 */

import { existsSync, readFileSync } from "node:fs";
import stripAnsi from "strip-ansi";

import type { Outcome, TestPath } from "../core/model.js";
import { display } from "../core/path.js";

export const STATUS_COLUMN = 20;

export function plural(n: number): string {
  return n <= 1 ? "" : "s";
}

/**
 * `name` padded past the longest group name, then the index right-aligned.
 */
export function formatPath(path: TestPath, maxLabel: number): string {
  return `${path.name.padEnd(maxLabel + 8)}${String(path.index).padStart(3)}`;
}

export function statusTag(outcome: Outcome): string {
  switch (outcome.status) {
    case "ok":
      return "[OK]";
    case "fault":
      return "[FAIL]";
    case "check-failed":
      return "[ERROR]";
    case "skipped":
      return "[SKIP]";
    case "pending":
      return "[TODO]";
  }
}

export function statusChar(outcome: Outcome): string {
  switch (outcome.status) {
    case "ok":
      return ".";
    case "fault":
      return "F";
    case "check-failed":
      return "E";
    case "skipped":
      return "S";
    case "pending":
      return "T";
  }
}

export interface ErrorReportInput {
  path: TestPath;
  description: string;
  /** Rendered failure line of the outcome */
  error: string;
  /** The test's output file */
  file: string;
  /** Output was not captured, so there is no file to quote */
  verbose: boolean;
}

/**
 * The block printed for one failing test at the end of a run.
 */
export function renderErrorReport(input: ErrorReportInput): string {
  const { path, description, error, file, verbose } = input;

  const logs =
    verbose || !existsSync(file)
      ? `${error}\n`
      : `in \`${file}\`:\n${stripAnsi(readFileSync(file, "utf-8"))}`;

  return `-- ${display(path)} [${description}] Failed --\n${logs}`;
}
