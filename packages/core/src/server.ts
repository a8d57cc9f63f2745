/**
 * Stdio MCP server bootstrap shared by the server packages.
 */

import { Writable } from "node:stream";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Build the services the tools close over */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Stdout for protocol frames, bound to the writer stdout has now. Tools that
 * later replace `process.stdout.write` do not see the frames.
 */
export function protocolOutput(stdout: Pick<NodeJS.WriteStream, "write"> = process.stdout): Writable {
  const write = stdout.write;
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      write.call(stdout, chunk, undefined, callback);
    },
  });
}

/**
 * Create services, register tools, install signal handlers and connect over stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "runcase:test-runner", version: "0.1.0" },
 *   createServices: () => ({ suites: new SuiteRunnerService(process.cwd()) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });
  registerTools(server, services);

  const transport = new StdioServerTransport(process.stdin, protocolOutput());

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
}

/**
 * bootstrapServer with fatal errors logged to stderr and a non-zero exit.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
