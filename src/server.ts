#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { EnvProbeInputSchema, TOOL_NAME, handleEnvProbe, type ToolContext } from "./tools/env-probe.js";

async function main(): Promise<void> {
  logger.info("Starting shell-env-probe MCP server");

  const { config, configPath, firstRun } = loadConfig(process.env.ENV_PROBE_CONFIG);
  logger.info({ configPath, firstRun, shell: config.shell }, "Configuration loaded");

  const ctx: ToolContext = { config, executor: new LocalExecutor() };

  const server = new McpServer({
    name: "shell-env-probe",
    version: "0.1.0",
  });

  server.registerTool(
    TOOL_NAME,
    {
      title: "Probe shell environment changes",
      description:
        "Run a script in another shell (sh, bash, zsh, fish, PowerShell) and return the environment " +
        "variables it added or changed. Removed variables are not reported. The script really runs: " +
        "file system and other side effects are not sandboxed.",
      inputSchema: EnvProbeInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async (args) => {
      const response = await handleEnvProbe(args, ctx);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
        isError: response.status === "error",
      };
    },
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("shell-env-probe server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
