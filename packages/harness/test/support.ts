import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Sink } from "../src/core/model.js";
import { OutputChannel } from "../src/infrastructure/OutputChannel.js";

/**
 * In-memory stand-in for process.stdout / process.stderr.
 */
export class RecordingSink implements Sink {
  readonly chunks: string[] = [];

  write(chunk: string | Uint8Array, ...rest: unknown[]): boolean {
    this.chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    for (const arg of rest) {
      if (typeof arg === "function") arg();
    }
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }
}

export interface FakeConsole {
  stdout: RecordingSink;
  stderr: RecordingSink;
  channel: OutputChannel;
}

export function fakeConsole(): FakeConsole {
  const stdout = new RecordingSink();
  const stderr = new RecordingSink();
  return { stdout, stderr, channel: new OutputChannel({ stdout, stderr }) };
}

export function tempDir(): { path: string; remove: () => void } {
  const path = mkdtempSync(join(tmpdir(), "runcase-"));
  return { path, remove: () => rmSync(path, { recursive: true, force: true }) };
}

export function firstLine(text: string): string {
  return text.split("\n")[0] ?? "";
}
