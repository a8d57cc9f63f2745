import minimist from "minimist";
import { z } from "zod/v4";
import type { Result } from "@runcase/core";
import { Ok, Err, andThen } from "@runcase/core";

import type { Command, FilterCriteria, RunConfig } from "../core/model.js";
import { UsageError } from "../core/errors.js";
import { compilePattern, parseCases } from "../core/filter.js";
import { resolveConfig } from "./options.js";

const BOOLEAN_FLAGS = ["verbose", "compact", "show-errors", "quick-tests", "json", "help"];

const ALIASES: Record<string, string> = {
  o: "output-dir",
  v: "verbose",
  c: "compact",
  e: "show-errors",
  q: "quick-tests",
  h: "help",
};

const KNOWN = new Set(["output-dir", ...BOOLEAN_FLAGS, ...Object.keys(ALIASES)]);

const ParsedArgs = z.object({
  _: z.array(z.coerce.string()),
  "output-dir": z.string().optional(),
  verbose: z.boolean(),
  compact: z.boolean(),
  "show-errors": z.boolean(),
  "quick-tests": z.boolean(),
  json: z.boolean(),
  help: z.boolean(),
});

function flagName(arg: string): string {
  return arg.replace(/^--?(no-)?/, "").split("=")[0];
}

function testCriteria(pattern?: string, cases?: string): Result<FilterCriteria, UsageError> {
  const compiled = pattern === undefined ? Ok(undefined) : compilePattern(pattern);
  if (!compiled.ok) return compiled;

  const parsed = cases === undefined ? Ok(undefined) : parseCases(cases);
  if (!parsed.ok) return parsed;

  return Ok({ pattern: compiled.value, cases: parsed.value });
}

function toCommand(positional: string[], config: RunConfig): Result<Command, UsageError> {
  const [name, ...rest] = positional;

  switch (name) {
    case undefined:
      return Ok({ kind: "run", config });
    case "list":
      if (rest.length > 0) {
        return Err(new UsageError(`Too many arguments for list: ${rest.join(" ")}`));
      }
      return Ok({ kind: "list", config });
    case "test": {
      if (rest.length > 2) {
        return Err(new UsageError(`Too many arguments for test: ${rest.slice(2).join(" ")}`));
      }
      const [pattern, cases] = rest;
      return andThen(testCriteria(pattern, cases), (criteria) =>
        Ok<Command>({ kind: "test", config, criteria })
      );
    }
    default:
      return Err(new UsageError(`Unknown command ${JSON.stringify(name)}`));
  }
}

/**
 * Parse `[run] | test [NAME_REGEX] [CASES] | list` plus options.
 */
export function parseCommand(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  cwd: string
): Result<Command, UsageError> {
  const unknown: string[] = [];
  const raw = minimist([...argv], {
    string: ["output-dir", "_"],
    boolean: BOOLEAN_FLAGS,
    alias: ALIASES,
    unknown: (arg) => {
      if (arg.startsWith("-") && !KNOWN.has(flagName(arg))) {
        unknown.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknown.length > 0) {
    return Err(new UsageError(`Unknown option${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`));
  }

  const parsed = ParsedArgs.safeParse(raw);
  if (!parsed.success) {
    return Err(new UsageError("Options -o and --output-dir take a single directory"));
  }
  const args = parsed.data;

  if (args.help) {
    return Ok({ kind: "help" });
  }

  const config = resolveConfig(
    {
      outputDir: args["output-dir"],
      verbose: args.verbose,
      compact: args.compact,
      showErrors: args["show-errors"],
      quickTests: args["quick-tests"],
      json: args.json,
    },
    env,
    cwd
  );
  return andThen(config, (value) => toCommand(args._, value));
}
