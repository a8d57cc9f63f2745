import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SuiteRunnerService } from "../core/ports/SuiteRunnerService.js";

import { registerListTests } from "./listTests.js";
import { registerRunTests } from "./runTests.js";
import { registerGetTestOutput } from "./getTestOutput.js";

export interface Services {
  suites: SuiteRunnerService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { suites } = services;

  registerListTests(server, suites);
  registerRunTests(server, suites);
  registerGetTestOutput(server, suites);
}
