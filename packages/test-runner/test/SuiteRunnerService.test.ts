import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readlinkSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { OutputChannel } from "@runcase/harness";

import { SuiteRunnerServiceImpl, toArgv } from "../src/infrastructure/SuiteRunnerServiceImpl.js";
import { MemorySink } from "../src/infrastructure/MemorySink.js";

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), "fixtures");

function createService(): { service: SuiteRunnerServiceImpl; stderr: MemorySink } {
  const stderr = new MemorySink();
  const channel = new OutputChannel({ stdout: new MemorySink(), stderr });
  const service = new SuiteRunnerServiceImpl(FIXTURES, {
    channel,
    importModule: (file) => import(file),
  });
  return { service, stderr };
}

describe("toArgv", () => {
  it("is empty for a plain run", () => {
    expect(toArgv({})).toEqual([]);
  });

  it("puts flags before the test command", () => {
    expect(toArgv({ nameRegex: "-math", cases: "0-2", quickTests: true, outputDir: "/tmp/out" })).toEqual([
      "--quick-tests",
      "--output-dir",
      "/tmp/out",
      "--",
      "test",
      "-math",
      "0-2",
    ]);
  });

  it("matches every group when only cases are given", () => {
    expect(toArgv({ cases: "1" })).toEqual(["--", "test", "", "1"]);
  });
});

describe("SuiteRunnerServiceImpl", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "runcase-runner-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("lists the tests sorted by id", async () => {
      const { service } = createService();
      const result = await service.load("arith.suite.ts");

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.name).toBe("arith");
      expect(result.value.module).toBe(join(FIXTURES, "arith.suite.ts"));
      expect(result.value.tests.map((t) => [t.id, t.speed, t.description])).toEqual([
        ["errors.000", "quick", "gives up."],
        ["math.000", "quick", "adds small numbers."],
        ["math.001", "slow", "adds large numbers."],
      ]);
    });

    it("makes the suite current", async () => {
      const { service } = createService();
      expect(service.current().ok).toBe(false);

      await service.load("arith.suite.ts");
      const current = service.current();
      expect(current.ok && current.value.name).toBe("arith");
    });

    it("reports registration errors", async () => {
      const { service } = createService();
      const result = await service.load("invalid.suite.ts");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        'Error: "bad/name" is not a valid test label (must match ^[a-zA-Z0-9_\\- ]+$).'
      );
    });

    it("rejects a module without a suite export", async () => {
      const { service } = createService();
      const result = await service.load("plain.ts");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("plain.ts has no `suite` export created with defineSuite");
    });

    it("reports a module that cannot be imported", async () => {
      const { service } = createService();
      const result = await service.load("missing.suite.ts");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message.startsWith("Cannot load missing.suite.ts: ")).toBe(true);
    });
  });

  describe("run", () => {
    it("requires a loaded suite", async () => {
      const { service } = createService();
      const result = await service.run({ outputDir });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        "No suite loaded. Pass `module` to list_tests or run_tests first."
      );
    });

    it("runs every test in registration order", async () => {
      const { service, stderr } = createService();
      await service.load("arith.suite.ts");
      const result = await service.run({ outputDir });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const run = result.value;

      expect(run.suite).toBe("arith");
      expect(run.success).toBe(false);
      expect(run.summary.ran).toBe(3);
      expect(run.summary.failed).toBe(1);
      expect(run.runDir).toBe(join(outputDir, run.runId));
      expect(run.tests.map((t) => [t.id, t.outcome.status])).toEqual([
        ["math.000", "ok"],
        ["math.001", "ok"],
        ["errors.000", "fault"],
      ]);
      expect(run.errors).toHaveLength(1);
      expect(run.errors[0]?.startsWith("-- errors.000 [gives up.] Failed --\nin `")).toBe(true);
      expect(run.report.startsWith(`Testing \`arith\`.\nThis run has ID \`${run.runId}\`.\n`)).toBe(true);
      expect(stderr.text().split("\n")[0]).toBe("[failure] boom");
    });

    it("points the latest symlink at the run directory", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const result = await service.run({ outputDir });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(readlinkSync(join(outputDir, "latest"))).toBe(result.value.runDir);
    });

    it("skips slow tests in quick mode", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const result = await service.run({ outputDir, quickTests: true });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.summary.ran).toBe(2);
      expect(result.value.tests.map((t) => t.outcome.status)).toEqual(["ok", "skipped", "fault"]);
    });

    it("runs only the selected cases", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const result = await service.run({ outputDir, nameRegex: "math", cases: "1" });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.success).toBe(true);
      expect(result.value.summary.ran).toBe(1);
      expect(result.value.tests.map((t) => t.outcome.status)).toEqual(["skipped", "ok", "skipped"]);
    });

    it("runs overlapping requests one after the other", async () => {
      const { service } = createService();
      await service.load("waiting.suite.ts");
      const [first, second] = await Promise.all([service.run({ outputDir }), service.run({ outputDir })]);

      expect(first.ok && first.value.success).toBe(true);
      expect(second.ok && second.value.success).toBe(true);
      if (!first.ok || !second.ok) return;
      expect(first.value.runId).not.toBe(second.value.runId);
      expect(readlinkSync(join(outputDir, "latest"))).toBe(second.value.runDir);
    });

    it("fails when the filter selects nothing", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const result = await service.run({ outputDir, nameRegex: "geometry" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Invalid request (no tests to run, filter skipped everything)!");
    });

    it("fails on a bad case list", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const result = await service.run({ outputDir, cases: "one" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message.startsWith('Invalid test cases "one"')).toBe(true);
    });
  });

  describe("readOutput", () => {
    it("requires a run", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const result = await service.readOutput("math.000");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("No tests have been run yet. Use run_tests first.");
    });

    it("reads a failing test's file", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const run = await service.run({ outputDir });
      expect(run.ok).toBe(true);
      if (!run.ok) return;

      const result = await service.readOutput("errors.000");
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.file).toBe(join(run.value.runDir, "errors.000.output"));
      expect(result.value.contents.split("\n")[0]).toBe("[failure] boom");
    });

    it("reads an empty file for a passing test", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      await service.run({ outputDir });

      const result = await service.readOutput("math.000");
      expect(result.ok && result.value.contents).toBe("");
    });

    it("rejects an unknown id", async () => {
      const { service } = createService();
      await service.load("arith.suite.ts");
      const run = await service.run({ outputDir });
      expect(run.ok).toBe(true);
      if (!run.ok) return;

      const result = await service.readOutput("math.007");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(`Unknown test "math.007" in run ${run.value.runId}`);
    });
  });
});
