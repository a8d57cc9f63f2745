// Core domain exports
export type {
  SuiteListing,
  RunTestsRequest,
  TestResult,
  SuiteRun,
  TestOutput,
} from "./core/model.js";
export type { SuiteRunnerService } from "./core/ports/SuiteRunnerService.js";

// Infrastructure exports
export {
  SuiteRunnerServiceImpl,
  toArgv,
  type ModuleImporter,
  type SuiteRunnerOptions,
} from "./infrastructure/SuiteRunnerServiceImpl.js";
export { MemorySink } from "./infrastructure/MemorySink.js";

// Tool exports
export { registerAllTools, type Services } from "./tools/index.js";
export { formatListing } from "./tools/listTests.js";
export { formatRun } from "./tools/runTests.js";
export { formatOutput } from "./tools/getTestOutput.js";
