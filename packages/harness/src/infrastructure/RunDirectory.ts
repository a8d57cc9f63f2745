/**
 * Run directory layout: `<base>/<run id>/`, plus `<base>/<binary>` and
 * `<base>/latest` symlinks pointing at the newest run.
 */

import { existsSync, lstatSync, mkdirSync, statSync, symlinkSync, unlinkSync } from "node:fs";
import { join } from "node:path";

import { OutputCaptureError } from "../core/errors.js";

export interface RunDirectoryOptions {
  baseDir: string;
  runId: string;
  /** Name of the test executable, used for the second symlink */
  binaryName: string;
  /** Defaults to process.platform */
  platform?: NodeJS.Platform;
}

export function runDirectory(baseDir: string, runId: string): string {
  return join(baseDir, runId);
}

/** Only links and plain files are replaced; a real directory is left alone. */
function replaceLink(target: string, link: string): void {
  const existing = lstatSync(link, { throwIfNoEntry: false });
  if (existing !== undefined) {
    if (existing.isDirectory()) {
      throw new OutputCaptureError(`${JSON.stringify(link)} is a directory, not a link`);
    }
    unlinkSync(link);
  }
  symlinkSync(target, link, "dir");
}

/**
 * Create the run directory (and its convenience links) if needed.
 * Any I/O failure here is fatal for the run.
 */
export function prepareRunDirectory(options: RunDirectoryOptions): string {
  const { baseDir, runId, binaryName } = options;
  const platform = options.platform ?? process.platform;
  const dir = runDirectory(baseDir, runId);

  if (existsSync(dir)) {
    if (!statSync(dir).isDirectory()) {
      throw new OutputCaptureError(`exists but is not a directory: ${JSON.stringify(dir)}`);
    }
    return dir;
  }

  try {
    mkdirSync(dir, { recursive: true, mode: 0o770 });
    if (platform !== "win32") {
      replaceLink(dir, join(baseDir, binaryName));
      replaceLink(dir, join(baseDir, "latest"));
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new OutputCaptureError(`Cannot prepare run directory ${dir}: ${reason}`, { cause: error });
  }

  return dir;
}
