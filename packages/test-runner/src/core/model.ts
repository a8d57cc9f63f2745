/**
 * Domain types for driving a loaded suite from MCP tools.
 */

import type { ListedTest, Outcome, RunSummary } from "@runcase/harness";

/**
 * A loaded suite module and its tests.
 */
export interface SuiteListing {
  /** Module path as given, resolved against the server's working directory */
  module: string;
  name: string;
  tests: ListedTest[];
}

/**
 * Options for one run of the loaded suite.
 */
export interface RunTestsRequest {
  /** Only run tests whose group name matches (unanchored) */
  nameRegex?: string;
  /** Case indices, e.g. "0,2-4" */
  cases?: string;
  /** Skip slow tests */
  quickTests?: boolean;
  /** Base directory for run directories. Default: <cwd>/_build/_tests */
  outputDir?: string;
}

/**
 * One test of a finished run.
 */
export interface TestResult {
  /** Display identity, e.g. `math.001` */
  id: string;
  description: string;
  outcome: Outcome;
}

/**
 * What the last run did.
 */
export interface SuiteRun {
  suite: string;
  runId: string;
  runDir: string;
  summary: RunSummary;
  success: boolean;
  tests: TestResult[];
  /** Rendered failure reports, most recent first */
  errors: readonly string[];
  /** Text the reporter printed during the run */
  report: string;
}

/**
 * Captured output of one test from the last run.
 */
export interface TestOutput {
  id: string;
  file: string;
  contents: string;
}
