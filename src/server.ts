import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { errorToMcpResponse } from "./mcp/errors.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./config/constants.js";
import { logger } from "./util/logger.js";

export interface ToolHandler {
  (args: unknown): Promise<unknown>;
}

interface ToolDefinition {
  name: string;
  description?: string;
  inputSchema: z.ZodTypeAny;
  handler: ToolHandler;
}

export interface ToolCallResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

export class MCPServer {
  private server: Server;
  private tools: Map<string, ToolDefinition> = new Map();

  constructor() {
    this.server = new Server(
      {
        name: SERVICE_NAME,
        version: SERVICE_VERSION,
      },
      { capabilities: { tools: {} } },
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments),
    );
  }

  listTools(): {
    name: string;
    description?: string;
    inputSchema: { type: "object"; [key: string]: unknown };
  }[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: convertSchema(tool.inputSchema),
    }));
  }

  async callTool(name: string, args: unknown): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return {
        content: [{ type: "text", text: `Tool '${name}' not found` }],
        isError: true,
      };
    }

    const start = Date.now();
    try {
      const result = await tool.handler(args);
      logger.debug("Tool call completed", {
        tool: name,
        durationMs: Date.now() - start,
      });
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      logger.error(`Tool ${name} failed`, {
        error,
        durationMs: Date.now() - start,
      });
      // Errors go back as content so the client sees the code
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(errorToMcpResponse(error), null, 2),
          },
        ],
        isError: true,
      };
    }
  }

  registerTool(
    name: string,
    description: string,
    inputSchema: z.ZodTypeAny,
    handler: ToolHandler,
  ): void {
    this.tools.set(name, {
      name,
      description,
      inputSchema,
      handler,
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
  }

  async stop(): Promise<void> {
    await this.server.close();
  }

  getServer(): Server {
    return this.server;
  }
}

function convertSchema(schema: z.ZodTypeAny): {
  type: "object";
  [key: string]: unknown;
} {
  const json = zodToJsonSchema(schema, { target: "openApi3" });
  return { ...json, type: "object" };
}
