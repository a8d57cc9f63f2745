import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@runcase/core";
import type { TestOutput } from "../core/model.js";
import type { SuiteRunnerService } from "../core/ports/SuiteRunnerService.js";

export function formatOutput(output: TestOutput): string {
  if (output.contents === "") {
    return `## ${output.id}\n\nNo output (\`${output.file}\`).\n`;
  }
  return `## ${output.id}\n\nFile: \`${output.file}\`\n\n\`\`\`\n${output.contents.trimEnd()}\n\`\`\`\n`;
}

export function registerGetTestOutput(server: McpServer, service: SuiteRunnerService): void {
  server.registerTool(
    "get_test_output",
    {
      title: "Get test output",
      description: `Read what one test printed during the last run.

Failing tests also have their failure line at the end of the file.`,
      inputSchema: {
        id: z.string().describe("Test id as shown by list_tests, e.g. math.001"),
      },
    },
    async ({ id }) => resultToResponse(await service.readOutput(id), formatOutput)
  );
}
