import { join } from "node:path";

import type { Outcome, TestPath } from "../core/model.js";
import type { CapturePort, Redirection } from "../core/ports/ExecutionStrategy.js";
import { outputFileName } from "../core/path.js";
import { failureLine } from "../execution/classify.js";
import type { OutputChannel } from "./OutputChannel.js";

export interface OutputCaptureOptions {
  channel: OutputChannel;
  /** Run directory holding one output file per test */
  directory: string;
  /** When set, nothing is captured */
  verbose: boolean;
}

/**
 * Sends each test's stdout/stderr to `<directory>/<file key>.output`.
 * A failing test's message is written to its file and then echoed on the
 * restored stderr.
 */
export class OutputCapture implements CapturePort {
  constructor(private readonly options: OutputCaptureOptions) {}

  get enabled(): boolean {
    return !this.options.verbose;
  }

  fileFor(path: TestPath): string {
    return join(this.options.directory, outputFileName(path));
  }

  open(path: TestPath): Redirection {
    return this.options.channel.tryAcquire(this.fileFor(path));
  }

  openQueued(path: TestPath): Promise<Redirection> {
    return this.options.channel.acquire(this.fileFor(path));
  }

  record(redirection: Redirection, outcome: Outcome): void {
    const line = failureLine(outcome);
    if (line !== null) {
      redirection.append(`${line}\n`);
    }
  }

  echo(outcome: Outcome): void {
    const line = failureLine(outcome);
    if (line !== null) {
      this.options.channel.stderr.write(`${line}\n`);
    }
  }
}
