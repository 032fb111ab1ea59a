import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { HybridHomeAssistantClient } from './homeassistant/client.js';
import { RestClient } from './homeassistant/restClient.js';
import { toWebSocketUrl, WsConnection } from './homeassistant/wsConnection.js';
import { createHttpApp } from './http/app.js';
import { isLoopbackHost } from './http/auth.js';
import { createLogger } from './logger.js';
import { buildMcpServer } from './mcp/server.js';
import { buildToolRegistry } from './tools/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const rest = new RestClient({
    baseUrl: config.haBaseUrl,
    token: config.haToken,
    timeoutMs: config.requestTimeoutMs,
    readRetries: config.readRetries,
    readRetryBackoffMs: config.readRetryBackoffMs,
    logger
  });
  const ws = new WsConnection({
    url: toWebSocketUrl(config.haBaseUrl),
    token: config.haToken,
    timeoutMs: config.requestTimeoutMs,
    logger
  });
  const client = new HybridHomeAssistantClient({ rest, ws, logger });
  const registry = buildToolRegistry({ safeMode: config.safeMode, logger });

  const deps = {
    config,
    logger,
    client,
    registry
  };

  if (config.mcpTransport === 'stdio') {
    const server = buildMcpServer(deps);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info(
      {
        transport: 'stdio',
        baseUrl: config.haBaseUrl,
        safeMode: config.safeMode,
        tools: registry.list().length
      },
      'Home Assistant MCP server running on stdio'
    );

    const shutdown = async () => {
      logger.info('Shutting down stdio server');
      client.close();
      await server.close();
      process.exit(0);
    };
    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    return;
  }

  if (!isLoopbackHost(config.mcpHttpHost)) {
    if (!config.mcpHttpAllowNonLoopback) {
      throw new Error(
        `Refusing to bind MCP HTTP transport to non-loopback host "${config.mcpHttpHost}". ` +
          'Set MCP_HTTP_ALLOW_NON_LOOPBACK=true to override intentionally.'
      );
    }
    if (!config.mcpHttpAuthToken) {
      throw new Error('MCP_HTTP_AUTH_TOKEN is required when binding the HTTP transport to a non-loopback host.');
    }
    logger.warn(
      {
        host: config.mcpHttpHost,
        port: config.mcpHttpPort
      },
      'MCP HTTP transport is binding to a non-loopback host because MCP_HTTP_ALLOW_NON_LOOPBACK is enabled'
    );
  }

  const app = createHttpApp(deps);
  const httpServer = app.listen(config.mcpHttpPort, config.mcpHttpHost, () => {
    logger.info(
      {
        transport: 'http',
        host: config.mcpHttpHost,
        port: config.mcpHttpPort,
        baseUrl: config.haBaseUrl,
        safeMode: config.safeMode,
        mcpHttpAuthRequired: Boolean(config.mcpHttpAuthToken)
      },
      'Home Assistant MCP server running on streamable HTTP'
    );
  });

  const shutdown = () => {
    logger.info('Shutting down HTTP server');
    client.close();
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  const text = error instanceof Error ? (error.stack ?? error.message) : String(error);
  console.error(text);
  process.exit(1);
});
