import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Logger } from 'pino';

import type { AppConfig } from '../config.js';
import type { HomeAssistantClient } from '../homeassistant/client.js';
import type { ToolRegistry } from '../tools/registry.js';

export interface ServerDependencies {
  config: AppConfig;
  logger: Logger;
  client: HomeAssistantClient;
  registry: ToolRegistry;
}

export const SERVER_NAME = 'homeassistant-mcp-tools';
export const SERVER_VERSION = '0.1.0';

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { config, client, logger, registry } = deps;

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      websiteUrl: 'https://developers.home-assistant.io/docs/api/rest/'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  for (const tool of registry.list()) {
    // Tools that change state are listed even in read-only mode; the registry refuses the call.
    const description =
      tool.mutating && config.safeMode === 'read_only' ? `${tool.description} (disabled: read-only mode)` : tool.description;

    server.registerTool(
      tool.name,
      {
        description,
        inputSchema: tool.inputSchema
      },
      async (args, extra) => registry.call(tool.name, args, { client, logger, signal: extra.signal })
    );
  }

  logger.debug({ tools: registry.list().length, safeMode: config.safeMode }, 'MCP server built');
  return server;
}
