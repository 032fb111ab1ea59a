import { describe, expect, test, vi } from 'vitest';

import { checkBearerToken, extractBearerToken, isLoopbackHost, sendHttpError } from '../../src/http/auth.js';

describe('isLoopbackHost', () => {
  test('accepts loopback names and addresses', () => {
    expect(isLoopbackHost('127.0.0.1')).toBe(true);
    expect(isLoopbackHost('localhost')).toBe(true);
    expect(isLoopbackHost('[::1]')).toBe(true);
  });

  test('rejects everything else', () => {
    expect(isLoopbackHost('0.0.0.0')).toBe(false);
    expect(isLoopbackHost('192.168.1.10')).toBe(false);
    expect(isLoopbackHost('')).toBe(false);
  });
});

describe('bearer auth', () => {
  test('extracts the token case-insensitively', () => {
    expect(extractBearerToken('bearer test-secret')).toBe('test-secret');
    expect(extractBearerToken(['Bearer test-secret'])).toBe('test-secret');
    expect(extractBearerToken('Basic abc')).toBeUndefined();
    expect(extractBearerToken(undefined)).toBeUndefined();
  });

  test('allows everything when no token is configured', () => {
    expect(checkBearerToken(undefined, undefined)).toEqual({ allowed: true });
  });

  test('answers 401 for a missing token and 403 for a wrong one', () => {
    expect(checkBearerToken('test-secret', undefined)).toEqual({
      allowed: false,
      status: 401,
      code: -32001,
      message: 'Unauthorized'
    });
    expect(checkBearerToken('test-secret', 'Bearer other')).toEqual({
      allowed: false,
      status: 403,
      code: -32003,
      message: 'Forbidden'
    });
    expect(checkBearerToken('test-secret', 'Bearer test-secret')).toEqual({ allowed: true });
  });

  test('formats MCP errors as JSON-RPC', () => {
    const json = vi.fn();
    const status = vi.fn(() => ({ json }));
    sendHttpError({ status }, 'mcp', 401, -32001, 'Unauthorized');
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ jsonrpc: '2.0', error: { code: -32001, message: 'Unauthorized' }, id: null });
  });
});
