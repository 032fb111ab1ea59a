import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { errorMessage } from '../errors.js';
import { buildMcpServer, type ServerDependencies } from '../mcp/server.js';
import { checkBearerToken, sendHttpError, type HttpRoute, type JsonResponder } from './auth.js';

export type HttpApp = ReturnType<typeof createMcpExpressApp>;

/**
 * Stateless streamable HTTP: every POST /mcp gets its own server and
 * transport, closed when the response ends.
 */
export function createHttpApp(deps: ServerDependencies): HttpApp {
  const { config, logger, client } = deps;
  const app = createMcpExpressApp({
    host: config.mcpHttpHost
  });

  const authorize = (authorizationHeader: string | string[] | undefined, route: HttpRoute, res: JsonResponder): boolean => {
    const decision = checkBearerToken(config.mcpHttpAuthToken, authorizationHeader);
    if (decision.allowed) {
      return true;
    }
    logger.warn({ route, status: decision.status }, 'HTTP request denied');
    sendHttpError(res, route, decision.status, decision.code, decision.message);
    return false;
  };

  app.get('/healthz', async (req, res) => {
    if (!authorize(req.headers.authorization, 'healthz', res)) {
      return;
    }

    try {
      const status = await client.ping();
      res.status(200).json({
        status: 'ok',
        homeAssistant: status.message,
        safeMode: config.safeMode,
        transport: config.mcpTransport,
        mcpHttpAuthRequired: Boolean(config.mcpHttpAuthToken),
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      sendHttpError(res, 'healthz', 503, -32000, errorMessage(error));
    }
  });

  app.post('/mcp', async (req, res) => {
    if (!authorize(req.headers.authorization, 'mcp', res)) {
      return;
    }

    const server = buildMcpServer(deps);
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined
      });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);

      res.on('close', () => {
        transport.close().catch((error: unknown) => logger.debug({ error: errorMessage(error) }, 'Transport close failed'));
        server.close().catch((error: unknown) => logger.debug({ error: errorMessage(error) }, 'Server close failed'));
      });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'HTTP transport request failed');
      if (!res.headersSent) {
        sendHttpError(res, 'mcp', 500, -32603, 'Internal server error');
      }
      await server.close();
    }
  });

  app.get('/mcp', (_req, res) => {
    sendHttpError(res, 'mcp', 405, -32000, 'Method not allowed.');
  });

  app.delete('/mcp', (_req, res) => {
    sendHttpError(res, 'mcp', 405, -32000, 'Method not allowed.');
  });

  return app;
}
