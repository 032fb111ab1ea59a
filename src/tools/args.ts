import { isRecord } from '../homeassistant/normalizer.js';

/** Tool arguments as they arrive from the transport: an untyped JSON object. */
export type ToolArgs = Record<string, unknown>;

export function getString(args: ToolArgs, key: string): string {
  const value = args[key];
  return typeof value === 'string' ? value : '';
}

export function getOptionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

export function getBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function getNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getArray(args: ToolArgs, key: string): unknown[] | undefined {
  const value = args[key];
  return Array.isArray(value) ? value : undefined;
}

export function getRecord(args: ToolArgs, key: string): Record<string, unknown> | undefined {
  const value = args[key];
  return isRecord(value) ? value : undefined;
}

/** String elements of an array argument; non-strings are dropped. */
export function getStringArray(args: ToolArgs, key: string): string[] | undefined {
  const value = getArray(args, key);
  if (!value) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Reads `entity_id` and checks its domain. Returns the id, or the error
 * message to hand back to the caller.
 */
export function requireDomainEntityId(
  args: ToolArgs,
  domain: string,
  example: string
): { entityId: string } | { error: string } {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return { error: 'entity_id is required' };
  }
  if (!entityId.startsWith(`${domain}.`)) {
    const article = /^[aeiou]/.test(domain) ? 'an' : 'a';
    return { error: `entity_id must be ${article} ${domain} entity (e.g., ${example})` };
  }
  return { entityId };
}
