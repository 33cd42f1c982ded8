/**
 * GA4 MCP server
 *
 * Exposes the report tools over stdio to an MCP host.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from '../config/index.js';
import type { ReportService } from '../reports/reportService.js';
import { logger } from '../utils/logger.js';
import { createReportTools, type ToolDefinition } from './tools.js';

export function createServer(
  config: AppConfig,
  service: ReportService
): { server: McpServer; tools: ToolDefinition[] } {
  const server = new McpServer(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  const tools = createReportTools(service, config);
  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.inputSchema.shape, (args: unknown) => tool.execute(args));
  }

  return { server, tools };
}

export async function startServer(config: AppConfig, service: ReportService): Promise<McpServer> {
  const { server, tools } = createServer(config, service);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('GA4 MCP server listening on stdio', {
    name: config.server.name,
    tools: tools.map((t) => t.name),
  });

  return server;
}
