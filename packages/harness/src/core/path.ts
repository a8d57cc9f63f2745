import type { TestPath } from "./model.js";

/**
 * Build a path, rejecting indices that cannot name a case.
 */
export function pathOf(name: string, index: number): TestPath {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Test index must be a non-negative integer, got ${index}`);
  }
  return { name, index };
}

/**
 * Short display form: `math.004`.
 */
export function display(path: TestPath): string {
  return `${path.name}.${String(path.index).padStart(3, "0")}`;
}

/**
 * Case-insensitive identity used for uniqueness and for file names.
 */
export function fileKey(path: TestPath): string {
  return display({ name: path.name.toLowerCase(), index: path.index });
}

/**
 * Name of the file a test's captured output is written to.
 */
export function outputFileName(path: TestPath): string {
  return `${fileKey(path)}.output`;
}

/**
 * Order by group name, then by index.
 */
export function comparePaths(a: TestPath, b: TestPath): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.index - b.index;
}
