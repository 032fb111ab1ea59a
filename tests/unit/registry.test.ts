import { describe, expect, test, vi } from 'vitest';

import type { ToolDefinition } from '../../src/tools/registry.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { errorResult, jsonResult, listSummary, textResult } from '../../src/tools/results.js';
import { makeContext, makeFakeClient, makeLogger, resultText } from '../helpers/fakes.js';

function makeTool(overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    name: 'sample',
    description: 'Sample tool',
    inputSchema: {},
    mutating: false,
    handler: vi.fn(async () => textResult('done')),
    ...overrides
  };
}

describe('results', () => {
  test('puts the summary before pretty JSON', () => {
    expect(resultText(jsonResult([{ a: 1 }], 'things', 'Found 1 things'))).toBe('Found 1 things\n\n[\n  {\n    "a": 1\n  }\n]');
    expect(resultText(jsonResult({ a: 1 }, 'thing'))).toBe('{\n  "a": 1\n}');
  });

  test('reports values that cannot be encoded', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    const result = jsonResult(cyclic, 'things');
    expect(result.isError).toBe(true);
    expect(resultText(result).startsWith('Error formatting things: ')).toBe(true);
  });

  test('adds the verbose hint to compact summaries', () => {
    expect(listSummary(2, 'entities', false)).toBe('Found 2 entities (use verbose=true for full details)');
    expect(listSummary(2, 'entities', true)).toBe('Found 2 entities');
  });
});

describe('ToolRegistry', () => {
  test('rejects duplicate names', () => {
    const registry = new ToolRegistry({ safeMode: 'read_write', logger: makeLogger() });
    registry.register(makeTool());
    expect(() => registry.register(makeTool())).toThrow('Tool registered twice: sample');
  });

  test('reports unknown tools', async () => {
    const registry = new ToolRegistry({ safeMode: 'read_write', logger: makeLogger() });
    const result = await registry.call('missing', {}, makeContext(makeFakeClient()));
    expect(result).toEqual(errorResult('Unknown tool: missing'));
  });

  test('refuses mutating tools in read-only mode without running them', async () => {
    const tool = makeTool({ name: 'change_things', mutating: true });
    const registry = new ToolRegistry({ safeMode: 'read_only', logger: makeLogger() }).register(tool);

    const result = await registry.call('change_things', {}, makeContext(makeFakeClient()));

    expect(result).toEqual(
      errorResult('Server is running in read-only mode (HA_SAFE_MODE=read_only); change_things is disabled.')
    );
    expect(tool.handler).not.toHaveBeenCalled();
  });

  test('runs read-only tools in read-only mode', async () => {
    const registry = new ToolRegistry({ safeMode: 'read_only', logger: makeLogger() }).register(makeTool());
    const result = await registry.call('sample', { a: 1 }, makeContext(makeFakeClient()));
    expect(result).toEqual(textResult('done'));
  });

  test('turns a thrown handler error into an error result', async () => {
    const tool = makeTool({
      handler: vi.fn(async () => {
        throw new Error('boom');
      })
    });
    const logger = makeLogger();
    const registry = new ToolRegistry({ safeMode: 'read_write', logger }).register(tool);

    const result = await registry.call('sample', {}, makeContext(makeFakeClient()));

    expect(result).toEqual(errorResult('Error running sample: boom'));
    expect(logger.error).toHaveBeenCalledWith({ tool: 'sample', error: 'boom' }, 'Tool handler failed');
  });
});
