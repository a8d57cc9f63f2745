/**
 * Entry points: register groups, read the command line, run, report, exit.
 */

import { basename } from "node:path";
import { nanoid } from "nanoid";

import type {
  Command,
  Effect,
  Eventually,
  Outcome,
  ProtectedRun,
  RunConfig,
  RunSummary,
  Sink,
  SpeedLevel,
  SuiteEntry,
  TestBody,
  TestCase,
  TestGroup,
  TestPath,
} from "./core/model.js";
import type { ExecutionStrategy } from "./core/ports/ExecutionStrategy.js";
import { EmptySelectionError, HarnessError, RegistrationError, TestError } from "./core/errors.js";
import { filterTests, selectsAny } from "./core/filter.js";
import { registerAll } from "./core/registration.js";
import type { Suite } from "./core/Suite.js";
import { summarize } from "./core/summary.js";
import { ErrorLog } from "./execution/ErrorLog.js";
import { OutputCapture } from "./infrastructure/OutputCapture.js";
import { processChannel, type OutputChannel } from "./infrastructure/OutputChannel.js";
import { prepareRunDirectory } from "./infrastructure/RunDirectory.js";
import { parseCommand } from "./cli/parseCommand.js";
import { usage } from "./cli/help.js";
import { Reporter } from "./report/Reporter.js";

/** Exit status when the run could not start (bad names, empty selection, bad flags, I/O). */
export const FATAL_EXIT_CODE = 125;

/** Failure counts above this are reported as this exit status. */
export const MAX_FAILURE_EXIT_CODE = 124;

const SKIPPED: Outcome = { status: "skipped" };

export interface RunOptions {
  /** Command line without the node binary and script. Default: process.argv.slice(2) */
  argv?: readonly string[];
  /** Default: process.env */
  env?: Record<string, string | undefined>;
  /** Base for the default output directory. Default: process.cwd() */
  cwd?: string;
  /** Exit the process when done. Default: true */
  andExit?: boolean;
  /** Output channel to capture and report on. Default: process stdout/stderr */
  channel?: OutputChannel;
  /** Where progress and the summary are printed. Default: the channel's stdout */
  reportTo?: Sink;
  /** Default: a fresh nanoid */
  runId?: string;
  /** Name of the convenience symlink for this executable. Default: the script's file name */
  binaryName?: string;
}

/**
 * What one invocation did.
 */
export interface RunReport {
  command: Command["kind"];
  runId: string;
  /** Null for commands that run nothing */
  summary: RunSummary | null;
  /** Every test the run went through, in run order, with its outcome */
  results: Array<{ path: TestPath; outcome: Outcome }>;
  /** Rendered error reports, most recent first */
  errors: readonly string[];
  runDir: string | null;
  exitCode: number;
}

interface Invocation<A> {
  args: A;
  runId: string;
  binaryName: string;
  channel: OutputChannel;
}

export function exitCodeFor(summary: RunSummary): number {
  return Math.min(summary.failed, MAX_FAILURE_EXIT_CODE);
}

/**
 * A test harness for one host execution model.
 */
export class Harness<E extends Effect> {
  constructor(readonly strategy: ExecutionStrategy<E>) {}

  testCase<A = void>(description: string, speed: SpeedLevel, body: TestBody<E, A>): TestCase<E, A> {
    return { description, speed, body };
  }

  group<A = void>(name: string, cases: readonly TestCase<E, A>[]): TestGroup<E, A> {
    return { name, cases };
  }

  /**
   * Run `groups` according to the command line, then exit (or return).
   */
  run(name: string, groups: readonly TestGroup<E, void>[], options: RunOptions = {}): Eventually<E, void> {
    return this.runWithArgs(name, undefined, groups, options);
  }

  /**
   * Like run, passing `args` to every test body.
   *
   * With `andExit: false`, fatal errors are thrown, failing tests raise
   * TestError, and a clean run returns normally.
   */
  runWithArgs<A>(
    name: string,
    args: A,
    groups: readonly TestGroup<E, A>[],
    options: RunOptions = {}
  ): Eventually<E, void> {
    const andExit = options.andExit ?? true;
    const channel = options.channel ?? processChannel;

    const report = this.strategy.attempt(
      () => this.execute(name, args, groups, { ...options, channel }),
      (error): RunReport => {
        channel.stderr.write(`${describeFatal(error)}\n`);
        if (andExit) process.exit(FATAL_EXIT_CODE);
        throw error;
      }
    );

    return this.strategy.after(report, (done) => {
      if (andExit) process.exit(done.exitCode);
      if (done.summary !== null && done.summary.failed > 0) {
        throw new TestError(done.summary.failed);
      }
    });
  }

  /**
   * Register, parse and run without exiting. Fatal conditions are thrown.
   */
  execute<A>(
    name: string,
    args: A,
    groups: readonly TestGroup<E, A>[],
    options: RunOptions = {}
  ): Eventually<E, RunReport> {
    const registration = registerAll(this.strategy, groups);
    if (!registration.ok) {
      throw new RegistrationError(registration.error);
    }
    const suite = registration.value;

    const parsed = parseCommand(
      options.argv ?? process.argv.slice(2),
      options.env ?? process.env,
      options.cwd ?? process.cwd()
    );
    if (!parsed.ok) {
      throw parsed.error;
    }
    const command = parsed.value;

    const invocation: Invocation<A> = {
      args,
      runId: options.runId ?? nanoid(),
      binaryName: options.binaryName ?? basename(process.argv[1] ?? name),
      channel: options.channel ?? processChannel,
    };
    const idle = (exitCode: number): RunReport => ({
      command: command.kind,
      runId: invocation.runId,
      summary: null,
      results: [],
      errors: [],
      runDir: null,
      exitCode,
    });

    if (command.kind === "help") {
      (options.reportTo ?? invocation.channel.stdout).write(usage(name));
      return this.strategy.done(idle(0));
    }

    const reporter = this.reporter(suite, command.config, options.reportTo ?? invocation.channel.stdout);
    reporter.banner(name, invocation.runId);

    switch (command.kind) {
      case "list":
        reporter.list(suite.all().map((entry) => entry.path));
        return this.strategy.done(idle(0));
      case "run":
        return this.perform(command, suite, suite.all(), reporter, invocation);
      case "test": {
        const entries = suite.all();
        if (!selectsAny(entries, command.criteria)) {
          throw new EmptySelectionError();
        }
        const skip = this.strategy.constant<A>(SKIPPED);
        const selected = filterTests(entries, command.criteria, "substitute", skip);
        return this.perform(command, suite, selected, reporter, invocation);
      }
    }
  }

  private reporter<R>(suite: Suite<R>, config: RunConfig, out: Sink): Reporter {
    return new Reporter({
      out,
      config,
      maxLabel: suite.maxLabel,
      description: (path) => suite.description(path),
    });
  }

  private perform<A>(
    command: Extract<Command, { kind: "run" | "test" }>,
    suite: Suite<ProtectedRun<E, A>>,
    entries: readonly SuiteEntry<ProtectedRun<E, A>>[],
    reporter: Reporter,
    invocation: Invocation<A>
  ): Eventually<E, RunReport> {
    const { config } = command;
    const runDir = prepareRunDirectory({
      baseDir: config.outputDir,
      runId: invocation.runId,
      binaryName: invocation.binaryName,
    });
    const capture = new OutputCapture({
      channel: invocation.channel,
      directory: runDir,
      verbose: config.verbose,
    });
    const errors = new ErrorLog({
      description: (path) => suite.description(path),
      outputFile: (path) => capture.fileFor(path),
      verbose: config.verbose,
    });

    const minimum: SpeedLevel = config.quickTests ? "quick" : "slow";
    const skip = this.strategy.constant<A>(SKIPPED);
    const prepared = entries
      .map(({ path, run }) => ({ path, run: this.strategy.capture(capture, path, run) }))
      .map(({ path, run }) => ({
        path,
        run: minimum === "quick" && suite.speed(path) === "slow" ? skip : run,
      }));

    const startedAt = Date.now();
    const outcomes = this.strategy.sequence(prepared, invocation.args, {
      onStart: (path) => reporter.onStart(path),
      onResult: (path, outcome) => {
        errors.record(path, outcome);
        reporter.onResult(path, outcome);
      },
    });

    return this.strategy.after(outcomes, (settled): RunReport => {
      const summary = summarize(settled, (Date.now() - startedAt) / 1000);
      reporter.summary(summary, errors.all(), runDir);
      return {
        command: command.kind,
        runId: invocation.runId,
        summary,
        results: prepared.map(({ path }, i) => ({ path, outcome: settled[i] ?? SKIPPED })),
        errors: errors.all(),
        runDir,
        exitCode: exitCodeFor(summary),
      };
    });
  }
}

function describeFatal(error: unknown): string {
  if (error instanceof HarnessError) {
    return error.message;
  }
  return `Fatal error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`;
}
