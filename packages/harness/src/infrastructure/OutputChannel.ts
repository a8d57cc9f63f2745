/**
 * The process-wide output channel (stdout + stderr) as one exclusively
 * held resource.
 */

import { closeSync, openSync, writeSync } from "node:fs";

import type { Sink } from "../core/model.js";
import type { Redirection } from "../core/ports/ExecutionStrategy.js";
import { ChannelBusyError, OutputCaptureError } from "../core/errors.js";

export interface ChannelStreams {
  stdout: Sink;
  stderr: Sink;
}

type WriteFn = Sink["write"];

interface SavedWrite {
  sink: Sink;
  write: WriteFn;
  own: boolean;
}

function isCallback(value: unknown): value is () => void {
  return typeof value === "function";
}

// writeSync has separate string and buffer overloads.
function writeChunk(fd: number, chunk: string | Uint8Array): void {
  typeof chunk === "string" ? writeSync(fd, chunk) : writeSync(fd, chunk);
}

interface ChannelLock {
  holder: string | null;
  waiters: Array<() => void>;
}

// Keyed by stdout so every channel over the same streams shares one holder.
const locks = new WeakMap<Sink, ChannelLock>();

function lockFor(sink: Sink): ChannelLock {
  let lock = locks.get(sink);
  if (lock === undefined) {
    lock = { holder: null, waiters: [] };
    locks.set(sink, lock);
  }
  return lock;
}

export class OutputChannel {
  private readonly lock: ChannelLock;

  constructor(
    private readonly streams: ChannelStreams = { stdout: process.stdout, stderr: process.stderr }
  ) {
    this.lock = lockFor(streams.stdout);
  }

  get stdout(): Sink {
    return this.streams.stdout;
  }

  get stderr(): Sink {
    return this.streams.stderr;
  }

  /** File currently receiving the channel, if any. */
  get redirectedTo(): string | null {
    return this.lock.holder;
  }

  /**
   * Redirect both streams to `file` (truncated) right away.
   * Throws ChannelBusyError if a redirection is already held.
   */
  tryAcquire(file: string): Redirection {
    if (this.lock.holder !== null) {
      throw new ChannelBusyError(this.lock.holder);
    }

    let fd: number;
    try {
      fd = openSync(file, "w", 0o660);
    } catch (error) {
      throw new OutputCaptureError(`Cannot open output file ${file}`, { cause: error });
    }

    const redirect: WriteFn = (chunk, ...rest) => {
      writeChunk(fd, chunk);
      rest.find(isCallback)?.();
      return true;
    };

    const saved: SavedWrite[] = [this.streams.stdout, this.streams.stderr].map((sink) => ({
      sink,
      write: sink.write,
      own: Object.prototype.hasOwnProperty.call(sink, "write"),
    }));
    for (const { sink } of saved) {
      sink.write = redirect;
    }
    this.lock.holder = file;

    let released = false;
    return {
      file,
      append: (text) => writeChunk(fd, text),
      release: () => {
        if (released) return;
        released = true;
        for (const { sink, write, own } of saved) {
          if (own) {
            sink.write = write;
          } else {
            Reflect.deleteProperty(sink, "write");
          }
        }
        this.lock.holder = null;
        closeSync(fd);
        this.lock.waiters.shift()?.();
      },
    };
  }

  /**
   * Redirect once every earlier holder has released the channel.
   */
  async acquire(file: string): Promise<Redirection> {
    while (this.lock.holder !== null) {
      await new Promise<void>((resolve) => this.lock.waiters.push(resolve));
    }
    return this.tryAcquire(file);
  }
}

/** The channel over process.stdout and process.stderr. */
export const processChannel = new OutputChannel();
