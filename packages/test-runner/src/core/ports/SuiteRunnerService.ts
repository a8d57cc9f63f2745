import type { Result } from "@runcase/core";
import type { RunTestsRequest, SuiteListing, SuiteRun, TestOutput } from "../model.js";

/**
 * Port for loading a suite module and running it in-process.
 */
export interface SuiteRunnerService {
  /**
   * Import `module` and read its `suite` export.
   * Replaces any previously loaded suite.
   */
  load(module: string): Promise<Result<SuiteListing, Error>>;

  /** The loaded suite, if any. */
  current(): Result<SuiteListing, Error>;

  /**
   * Run the loaded suite. Fatal harness errors come back as Err.
   */
  run(request: RunTestsRequest): Promise<Result<SuiteRun, Error>>;

  /** The last successful run, if any. */
  lastRun(): Result<SuiteRun, Error>;

  /**
   * Read the captured output of test `id` (e.g. `math.001`) from the last run.
   */
  readOutput(id: string): Promise<Result<TestOutput, Error>>;
}
