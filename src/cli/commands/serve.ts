import { MCPServer } from "../../server.js";
import { registerTools } from "../../mcp/tools/index.js";
import { shutdownTracing } from "../../util/logger.js";
import type { ServeOptions } from "../types.js";
import { prepareCommand } from "./setup.js";

export async function serveCommand(options: ServeOptions): Promise<void> {
  prepareCommand(options);

  const server = new MCPServer();
  registerTools(server);

  let shutdownCalled = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shutdownCalled) {
      return;
    }
    shutdownCalled = true;
    console.error(`\nReceived ${signal}, shutting down gracefully...`);
    await server.stop();
    await shutdownTracing();
    process.exit(0);
  };

  const handleShutdown = (signal: "SIGINT" | "SIGTERM"): void => {
    void shutdown(signal).catch((error) => {
      console.error(
        `Failed to handle ${signal}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      process.exit(1);
    });
  };

  process.once("SIGINT", () => handleShutdown("SIGINT"));
  process.once("SIGTERM", () => handleShutdown("SIGTERM"));

  console.error("Starting MCP server on stdio transport...");
  await server.start();
}
