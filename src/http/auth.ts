export type HttpRoute = 'mcp' | 'healthz';

export interface JsonResponder {
  status: (status: number) => { json: (body: unknown) => void };
}

export function isLoopbackHost(host: string): boolean {
  const normalized = host.trim().toLowerCase().replace(/^\[(.*)\]$/, '$1');
  if (!normalized) {
    return false;
  }
  if (normalized === 'localhost' || normalized === '::1') {
    return true;
  }
  return normalized.startsWith('127.');
}

export function extractBearerToken(authorizationHeader: string | string[] | undefined): string | undefined {
  if (!authorizationHeader) {
    return undefined;
  }

  const rawValue = Array.isArray(authorizationHeader) ? authorizationHeader[0] : authorizationHeader;
  const match = rawValue?.match(/^Bearer\s+(.+)$/i);
  if (!match) {
    return undefined;
  }
  const token = match[1]?.trim();
  return token || undefined;
}

/** MCP routes answer in JSON-RPC shape; /healthz in its own status shape. */
export function sendHttpError(res: JsonResponder, route: HttpRoute, status: number, code: number, message: string): void {
  if (route === 'mcp') {
    res.status(status).json({
      jsonrpc: '2.0',
      error: { code, message },
      id: null
    });
    return;
  }
  res.status(status).json({
    status: 'error',
    error: message,
    timestamp: new Date().toISOString()
  });
}

export type AuthDecision = { allowed: true } | { allowed: false; status: 401 | 403; code: number; message: string };

/** With no expected token configured every request is allowed. */
export function checkBearerToken(
  expectedToken: string | undefined,
  authorizationHeader: string | string[] | undefined
): AuthDecision {
  if (!expectedToken) {
    return { allowed: true };
  }
  const providedToken = extractBearerToken(authorizationHeader);
  if (!providedToken) {
    return { allowed: false, status: 401, code: -32001, message: 'Unauthorized' };
  }
  if (providedToken !== expectedToken) {
    return { allowed: false, status: 403, code: -32003, message: 'Forbidden' };
  }
  return { allowed: true };
}
