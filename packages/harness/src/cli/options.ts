/**
 * Run options: environment defaults overridden by command-line flags.
 */

import { join, resolve } from "node:path";
import { z } from "zod/v4";
import type { Result } from "@runcase/core";
import { Ok, Err } from "@runcase/core";

import type { RunConfig } from "../core/model.js";
import { UsageError } from "../core/errors.js";

export const ENV = {
  outputDir: "RUNCASE_OUTPUT_DIR",
  verbose: "RUNCASE_VERBOSE",
  compact: "RUNCASE_COMPACT",
  showErrors: "RUNCASE_SHOW_ERRORS",
  quickTests: "RUNCASE_QUICK_TESTS",
  json: "RUNCASE_JSON",
} as const;

const EnvSchema = z.object({
  [ENV.outputDir]: z.string().min(1).optional(),
  [ENV.verbose]: z.stringbool().optional(),
  [ENV.compact]: z.stringbool().optional(),
  [ENV.showErrors]: z.stringbool().optional(),
  [ENV.quickTests]: z.stringbool().optional(),
  [ENV.json]: z.stringbool().optional(),
});

/**
 * Flags as given on the command line. Boolean flags can only switch an option on.
 */
export interface Flags {
  outputDir?: string;
  verbose: boolean;
  compact: boolean;
  showErrors: boolean;
  quickTests: boolean;
  json: boolean;
}

export function defaultOutputDir(cwd: string): string {
  return join(cwd, "_build", "_tests");
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
    .join("; ");
}

/**
 * Combine flags and environment into a run configuration.
 */
export function resolveConfig(
  flags: Flags,
  env: Record<string, string | undefined>,
  cwd: string
): Result<RunConfig, UsageError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return Err(new UsageError(`Invalid environment: ${describeIssues(parsed.error)}`));
  }
  const fromEnv = parsed.data;

  if (flags.outputDir === "") {
    return Err(new UsageError("Option -o requires a directory"));
  }

  return Ok({
    outputDir: resolve(cwd, flags.outputDir ?? fromEnv[ENV.outputDir] ?? defaultOutputDir(cwd)),
    verbose: flags.verbose || (fromEnv[ENV.verbose] ?? false),
    compact: flags.compact || (fromEnv[ENV.compact] ?? false),
    showErrors: flags.showErrors || (fromEnv[ENV.showErrors] ?? false),
    quickTests: flags.quickTests || (fromEnv[ENV.quickTests] ?? false),
    json: flags.json || (fromEnv[ENV.json] ?? false),
  });
}
