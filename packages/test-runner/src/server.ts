#!/usr/bin/env node
/**
 * MCP server that runs runcase suites in-process.
 *
 * Usage: runcase-test-runner [SUITE_MODULE]
 */

import { runServer } from "@runcase/core";
import { SuiteRunnerServiceImpl } from "./infrastructure/SuiteRunnerServiceImpl.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "runcase:test-runner",
    version: "0.1.0",
  },
  createServices: () => ({
    suites: new SuiteRunnerServiceImpl(process.cwd()),
  }),
  registerTools: registerAllTools,
  onStartup: async (services) => {
    const module = process.argv[2];
    if (module === undefined) {
      console.error(`[test-runner] No suite module given; pass one to list_tests or run_tests.`);
      return;
    }

    const result = await services.suites.load(module);
    if (result.ok) {
      console.error(`[test-runner] Loaded ${result.value.name}: ${result.value.tests.length} tests`);
    } else {
      console.error(`[test-runner] Warning: ${result.error.message}`);
    }
  },
});
