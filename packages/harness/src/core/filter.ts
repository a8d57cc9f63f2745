import type { Result } from "@runcase/core";
import { Ok, Err } from "@runcase/core";

import type { CaseSelection, FilterCriteria, FilterMode, SuiteEntry, TestPath } from "./model.js";
import { UsageError } from "./errors.js";

const CASES_FORMAT = "must be a comma-separated list of integers / integer ranges";

/**
 * Whether a path is selected: the pattern (if any) finds the group name,
 * and the index set (if any) contains the index.
 */
export function matches(criteria: FilterCriteria, path: TestPath): boolean {
  const nameMatches = criteria.pattern === undefined || criteria.pattern.test(path.name);
  const caseMatches = criteria.cases === undefined || criteria.cases.has(path.index);
  return nameMatches && caseMatches;
}

/**
 * Narrow a list of entries.
 *
 * - drop: non-matching entries are removed
 * - substitute: non-matching entries keep their place but run `skip` instead
 */
export function filterTests<R>(
  entries: readonly SuiteEntry<R>[],
  criteria: FilterCriteria,
  mode: FilterMode,
  skip: R
): SuiteEntry<R>[] {
  const result: SuiteEntry<R>[] = [];
  for (const entry of entries) {
    if (matches(criteria, entry.path)) {
      result.push(entry);
    } else if (mode === "substitute") {
      result.push({ path: entry.path, run: skip });
    }
  }
  return result;
}

/**
 * Whether any entry is selected at all.
 */
export function selectsAny(entries: readonly SuiteEntry<unknown>[], criteria: FilterCriteria): boolean {
  return entries.some((entry) => matches(criteria, entry.path));
}

/**
 * Inclusive index ranges, kept as bounds so a wide range costs nothing.
 */
export class CaseRanges implements CaseSelection {
  constructor(readonly ranges: ReadonlyArray<readonly [number, number]>) {}

  has(index: number): boolean {
    return this.ranges.some(([lower, upper]) => lower <= index && index <= upper);
  }
}

function parseBound(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parse a case list such as `4,6-10,19` (ranges may also be written `6..10`).
 */
export function parseCases(text: string): Result<CaseRanges, UsageError> {
  const ranges: Array<readonly [number, number]> = [];

  for (const part of text.split(",")) {
    const bounds = part.trim().split(/\.\.|-/).map(parseBound);

    if (bounds.length === 1 && bounds[0] !== null) {
      ranges.push([bounds[0], bounds[0]]);
      continue;
    }

    const [lower, upper] = bounds;
    if (bounds.length !== 2 || lower === null || upper === null || lower > upper) {
      return Err(new UsageError(`Invalid test cases ${JSON.stringify(text)}: ${CASES_FORMAT}`));
    }
    ranges.push([lower, upper]);
  }

  return Ok(new CaseRanges(ranges));
}

/**
 * Compile a group-name pattern.
 */
export function compilePattern(text: string): Result<RegExp, UsageError> {
  try {
    return Ok(new RegExp(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new UsageError(`Invalid name pattern ${JSON.stringify(text)}: ${reason}`));
  }
}
