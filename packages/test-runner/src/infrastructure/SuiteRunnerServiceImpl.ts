import { readFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import type { Result } from "@runcase/core";
import { Ok, Err, tryCatchAsync } from "@runcase/core";
import {
  display,
  isSuiteDefinition,
  outputFileName,
  processChannel,
  type OutputChannel,
  type SuiteDefinition,
  type TestPath,
} from "@runcase/harness";

import type { RunTestsRequest, SuiteListing, SuiteRun, TestOutput } from "../core/model.js";
import type { SuiteRunnerService } from "../core/ports/SuiteRunnerService.js";
import { MemorySink } from "./MemorySink.js";

export type ModuleImporter = (file: string) => Promise<unknown>;

export interface SuiteRunnerOptions {
  /** Output channel the harness captures. Default: the process streams */
  channel?: OutputChannel;
  /** Loads a module by absolute path. Default: dynamic import of its file URL */
  importModule?: ModuleImporter;
}

interface LoadedSuite {
  listing: SuiteListing;
  definition: SuiteDefinition;
}

interface LastRun {
  run: SuiteRun;
  paths: Map<string, TestPath>;
}

const importByUrl: ModuleImporter = (file) => import(pathToFileURL(file).href);

function suiteExport(module: unknown): SuiteDefinition | null {
  if (typeof module === "object" && module !== null && "suite" in module && isSuiteDefinition(module.suite)) {
    return module.suite;
  }
  return null;
}

/**
 * Command line for one request. Positionals follow `--` so that a pattern
 * starting with a dash is not read as a flag.
 */
export function toArgv(request: RunTestsRequest): string[] {
  const argv: string[] = [];
  if (request.quickTests) argv.push("--quick-tests");
  if (request.outputDir !== undefined) argv.push("--output-dir", request.outputDir);

  if (request.nameRegex !== undefined || request.cases !== undefined) {
    argv.push("--", "test", request.nameRegex ?? "");
    if (request.cases !== undefined) argv.push(request.cases);
  }
  return argv;
}

/**
 * Loads one suite module at a time and runs it inside this process.
 */
export class SuiteRunnerServiceImpl implements SuiteRunnerService {
  private loaded: LoadedSuite | null = null;
  private last: LastRun | null = null;
  private readonly importModule: ModuleImporter;
  private readonly channel: OutputChannel;
  /** Settles when the latest queued run has finished. */
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly rootPath: string,
    options: SuiteRunnerOptions = {}
  ) {
    this.importModule = options.importModule ?? importByUrl;
    this.channel = options.channel ?? processChannel;
  }

  async load(module: string): Promise<Result<SuiteListing, Error>> {
    const file = resolve(this.rootPath, module);
    const imported = await tryCatchAsync(() => this.importModule(file));
    if (!imported.ok) {
      return Err(new Error(`Cannot load ${module}: ${imported.error.message}`));
    }

    const definition = suiteExport(imported.value);
    if (definition === null) {
      return Err(new Error(`${module} has no \`suite\` export created with defineSuite`));
    }

    const tests = await tryCatchAsync(async () => definition.list());
    if (!tests.ok) {
      return tests;
    }

    const listing: SuiteListing = { module: file, name: definition.name, tests: tests.value };
    this.loaded = { listing, definition };
    this.last = null;
    return Ok(listing);
  }

  current(): Result<SuiteListing, Error> {
    if (this.loaded === null) {
      return Err(new Error("No suite loaded. Pass `module` to list_tests or run_tests first."));
    }
    return Ok(this.loaded.listing);
  }

  /**
   * Runs one request at a time; a request arriving mid-run waits its turn.
   */
  run(request: RunTestsRequest): Promise<Result<SuiteRun, Error>> {
    const turn = this.queue.then(() => this.runNow(request));
    // Callers observe a rejection through `turn`; the queue only orders runs.
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async runNow(request: RunTestsRequest): Promise<Result<SuiteRun, Error>> {
    const loaded = this.loaded;
    if (loaded === null) {
      return Err(new Error("No suite loaded. Pass `module` to list_tests or run_tests first."));
    }
    const { listing, definition } = loaded;

    const report = new MemorySink();
    const executed = await tryCatchAsync(() =>
      definition.execute({
        argv: toArgv(request),
        env: {},
        cwd: this.rootPath,
        andExit: false,
        channel: this.channel,
        reportTo: report,
        binaryName: basename(listing.module, extname(listing.module)),
      })
    );
    if (!executed.ok) {
      return executed;
    }

    const { summary, runDir, runId, results, errors } = executed.value;
    if (summary === null || runDir === null) {
      return Err(new Error(`Suite ${listing.name} did not run any tests`));
    }

    const descriptions = new Map(listing.tests.map((test) => [test.id, test.description]));
    const paths = new Map<string, TestPath>();
    const tests = results.map(({ path, outcome }) => {
      const id = display(path);
      paths.set(id, path);
      return { id, description: descriptions.get(id) ?? "", outcome };
    });

    const run: SuiteRun = {
      suite: listing.name,
      runId,
      runDir,
      summary,
      success: summary.failed === 0,
      tests,
      errors,
      report: report.text(),
    };
    this.last = { run, paths };
    return Ok(run);
  }

  lastRun(): Result<SuiteRun, Error> {
    if (this.last === null) {
      return Err(new Error("No tests have been run yet. Use run_tests first."));
    }
    return Ok(this.last.run);
  }

  async readOutput(id: string): Promise<Result<TestOutput, Error>> {
    const last = this.last;
    if (last === null) {
      return Err(new Error("No tests have been run yet. Use run_tests first."));
    }

    const path = last.paths.get(id);
    if (path === undefined) {
      return Err(new Error(`Unknown test ${JSON.stringify(id)} in run ${last.run.runId}`));
    }

    const file = join(last.run.runDir, outputFileName(path));
    const contents = await tryCatchAsync(() => readFile(file, "utf8"));
    if (!contents.ok) {
      return Err(new Error(`No output captured for ${id}: ${contents.error.message}`));
    }
    return Ok({ id, file, contents: contents.value });
  }
}
