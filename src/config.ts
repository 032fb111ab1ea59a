import { z } from 'zod/v4';

export type SafeMode = 'read_write' | 'read_only';
export type McpTransport = 'stdio' | 'http';

export interface AppConfig {
  haBaseUrl: string;
  haToken: string;
  requestTimeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;

  safeMode: SafeMode;

  mcpTransport: McpTransport;
  mcpHttpHost: string;
  mcpHttpPort: number;
  mcpHttpAllowNonLoopback: boolean;
  mcpHttpAuthToken?: string;

  logLevel: string;
}

const envSchema = z.object({
  HA_URL: z.string().optional(),
  HA_TOKEN: z.string().optional(),
  HA_TIMEOUT_MS: z.string().optional(),
  HA_READ_RETRIES: z.string().optional(),
  HA_READ_RETRY_BACKOFF_MS: z.string().optional(),
  HA_SAFE_MODE: z.string().optional(),

  MCP_TRANSPORT: z.string().optional(),
  MCP_HTTP_HOST: z.string().optional(),
  MCP_HTTP_PORT: z.string().optional(),
  MCP_HTTP_ALLOW_NON_LOOPBACK: z.string().optional(),
  MCP_HTTP_AUTH_TOKEN: z.string().optional(),

  MCP_LOG_LEVEL: z.string().optional()
});

export function normalizeBaseUrl(raw?: string): string {
  const fallback = 'http://homeassistant.local:8123';
  if (!raw || !raw.trim()) {
    return fallback;
  }

  // Users often paste the API root; every request path below adds /api itself.
  const trimmed = raw.trim().replace(/\/+$/, '').replace(/\/api$/, '');
  try {
    const parsed = new URL(trimmed);
    parsed.username = '';
    parsed.password = '';
    return parsed.toString().replace(/\/+$/, '');
  } catch {
    throw new Error(`Invalid HA_URL: ${raw}`);
  }
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseSafeMode(raw: string | undefined): SafeMode {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'read_only') {
    return 'read_only';
  }
  return 'read_write';
}

function parseTransport(raw: string | undefined): McpTransport {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'http') {
    return 'http';
  }
  return 'stdio';
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const haToken = parseOptionalString(parsed.HA_TOKEN);
  if (!haToken) {
    throw new Error('HA_TOKEN is required (create a long-lived access token in your Home Assistant profile).');
  }

  return {
    haBaseUrl: normalizeBaseUrl(parsed.HA_URL),
    haToken,
    requestTimeoutMs: parseNumber(parsed.HA_TIMEOUT_MS, 10_000, 500, 120_000),
    readRetries: parseNumber(parsed.HA_READ_RETRIES, 2, 0, 10),
    readRetryBackoffMs: parseNumber(parsed.HA_READ_RETRY_BACKOFF_MS, 200, 10, 10_000),

    safeMode: parseSafeMode(parsed.HA_SAFE_MODE),

    mcpTransport: parseTransport(parsed.MCP_TRANSPORT),
    mcpHttpHost: parsed.MCP_HTTP_HOST?.trim() || '127.0.0.1',
    mcpHttpPort: parseNumber(parsed.MCP_HTTP_PORT, 7423, 1, 65535),
    mcpHttpAllowNonLoopback: parseBoolean(parsed.MCP_HTTP_ALLOW_NON_LOOPBACK, false),
    mcpHttpAuthToken: parseOptionalString(parsed.MCP_HTTP_AUTH_TOKEN),

    logLevel: parsed.MCP_LOG_LEVEL?.trim() || 'info'
  };
}
