import { Harness } from "./Harness.js";
import { DeferredStrategy } from "./execution/DeferredStrategy.js";
import { ImmediateStrategy } from "./execution/ImmediateStrategy.js";

// Core domain exports
export type {
  TestPath,
  SpeedLevel,
  FaultKind,
  Outcome,
  OutcomeStatus,
  Effect,
  Eventually,
  TestBody,
  ProtectedRun,
  TestCase,
  TestGroup,
  SuiteEntry,
  RunSummary,
  MachineSummary,
  RunObserver,
  Sink,
  RunConfig,
  FilterCriteria,
  CaseSelection,
  FilterMode,
  Command,
} from "./core/model.js";
export { pathOf, display, fileKey, outputFileName, comparePaths } from "./core/path.js";
export {
  HarnessError,
  DuplicateTestError,
  InvalidNameError,
  RegistrationError,
  EmptySelectionError,
  UsageError,
  OutputCaptureError,
  ChannelBusyError,
  TestError,
  type HarnessErrorCode,
} from "./core/errors.js";
export {
  CheckError,
  Failure,
  InvalidArgument,
  PendingSignal,
  check,
  checkEqual,
  fail,
  todo,
} from "./core/signals.js";
export { Suite } from "./core/Suite.js";
export {
  NAME_PATTERN,
  validateName,
  normalizeDescription,
  register,
  registerAll,
  type Registration,
} from "./core/registration.js";
export { matches, filterTests, selectsAny, parseCases, compilePattern, CaseRanges } from "./core/filter.js";
export { hasRun, isFailure, summarize, toMachineSummary } from "./core/summary.js";
export type { ExecutionStrategy, CapturePort, Redirection } from "./core/ports/ExecutionStrategy.js";

// Execution
export { ImmediateStrategy } from "./execution/ImmediateStrategy.js";
export { DeferredStrategy } from "./execution/DeferredStrategy.js";
export { classify, failureLine, traceOf } from "./execution/classify.js";
export { ErrorLog } from "./execution/ErrorLog.js";

// Infrastructure
export { OutputChannel, processChannel, type ChannelStreams } from "./infrastructure/OutputChannel.js";
export { OutputCapture, type OutputCaptureOptions } from "./infrastructure/OutputCapture.js";
export { prepareRunDirectory, runDirectory } from "./infrastructure/RunDirectory.js";

// Reporting and CLI
export { Reporter, type ReporterOptions } from "./report/Reporter.js";
export { renderErrorReport } from "./report/format.js";
export { parseCommand } from "./cli/parseCommand.js";
export { resolveConfig, defaultOutputDir, ENV, type Flags } from "./cli/options.js";
export { usage } from "./cli/help.js";

export {
  Harness,
  FATAL_EXIT_CODE,
  MAX_FAILURE_EXIT_CODE,
  exitCodeFor,
  type RunOptions,
  type RunReport,
} from "./Harness.js";

export {
  defineSuite,
  isSuiteDefinition,
  type SuiteDefinition,
  type ListedTest,
} from "./SuiteDefinition.js";

/** Harness for synchronous test bodies. */
export const harness = new Harness(new ImmediateStrategy());

/** Harness for test bodies that may return promises. */
export const deferredHarness = new Harness(new DeferredStrategy());
