import type { MachineSummary, Outcome, RunSummary } from "./model.js";

/**
 * Whether the outcome is an actual execution attempt.
 */
export function hasRun(outcome: Outcome): boolean {
  switch (outcome.status) {
    case "ok":
    case "check-failed":
    case "fault":
      return true;
    case "skipped":
    case "pending":
      return false;
  }
}

/**
 * Whether the outcome counts against the run. Pending tests do; skipped ones never.
 */
export function isFailure(outcome: Outcome): boolean {
  switch (outcome.status) {
    case "check-failed":
    case "fault":
    case "pending":
      return true;
    case "ok":
    case "skipped":
      return false;
  }
}

export function summarize(outcomes: readonly Outcome[], time: number): RunSummary {
  return {
    ran: outcomes.filter(hasRun).length,
    failed: outcomes.filter(isFailure).length,
    time,
  };
}

export function toMachineSummary(summary: RunSummary): MachineSummary {
  return { success: summary.ran, failures: summary.failed, time: summary.time };
}
