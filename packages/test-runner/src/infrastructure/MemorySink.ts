import type { Sink } from "@runcase/harness";

/**
 * Collects everything written to it. Used as the reporter's output so
 * nothing reaches the stdio transport.
 */
export class MemorySink implements Sink {
  private readonly chunks: string[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }
}
