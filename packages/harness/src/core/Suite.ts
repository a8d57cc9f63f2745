import type { SpeedLevel, SuiteEntry, TestPath } from "./model.js";
import { DuplicateTestError } from "./errors.js";
import { fileKey } from "./path.js";

interface Metadata {
  description: string;
  speed: SpeedLevel;
}

/**
 * Registered tests in registration order, keyed by file key.
 *
 * Mutated only while groups are being registered; a run reads it.
 */
export class Suite<R> {
  private readonly entries: SuiteEntry<R>[] = [];
  private readonly metadata = new Map<string, Metadata>();
  private longestName = 0;

  /**
   * Add one test. Throws DuplicateTestError if its file key is taken,
   * leaving the existing entry untouched.
   */
  add(path: TestPath, description: string, speed: SpeedLevel, run: R): this {
    const key = fileKey(path);
    if (this.metadata.has(key)) {
      throw new DuplicateTestError(path.name);
    }

    this.entries.push({ path, run });
    this.metadata.set(key, { description, speed });
    this.longestName = Math.max(this.longestName, path.name.length);
    return this;
  }

  all(): SuiteEntry<R>[] {
    return [...this.entries];
  }

  has(path: TestPath): boolean {
    return this.metadata.has(fileKey(path));
  }

  description(path: TestPath): string {
    return this.metadata.get(fileKey(path))?.description ?? "";
  }

  speed(path: TestPath): SpeedLevel {
    return this.metadata.get(fileKey(path))?.speed ?? "slow";
  }

  get size(): number {
    return this.entries.length;
  }

  /** Length of the longest group name, for column alignment. */
  get maxLabel(): number {
    return this.longestName;
  }
}
