#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { createToolContext } from "./bootstrap.js";
import type { ToolResponse } from "./types/response.js";

async function main(): Promise<void> {
  logger.info("Starting sysconfig-compose server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const configResult = loadConfig();
  logger.info({ configPath: configResult.configPath, firstRun: configResult.firstRun }, "Configuration loaded");

  // ── Phase 2: Profiles, catalog, tool registry ─────────────────
  const ctx = createToolContext(configResult);

  // ── Phase 3: Create MCP server ────────────────────────────────
  const server = new McpServer({
    name: "sysconfig-compose",
    version: "0.1.0",
  });

  // ── Phase 4: Register tools on MCP server ─────────────────────
  for (const [name, tool] of ctx.registry.getAll()) {
    const meta = tool.metadata;

    let inputShape: z.ZodRawShape = {};
    if (meta.inputSchema instanceof z.ZodObject) {
      inputShape = meta.inputSchema.shape;
    }

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? true,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? true,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response: ToolResponse = await tool.execute(args);
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          const response: ToolResponse = {
            status: "error",
            tool: name,
            duration_ms: null,
            error_code: "INTERNAL_ERROR",
            error_category: "state",
            message,
            remediation: ["Check server logs for details"],
          };
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response) }],
            isError: true,
          };
        }
      },
    );
  }

  // ── Phase 5: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.size }, "sysconfig-compose server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
