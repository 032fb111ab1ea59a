import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import { toConfigMapping } from '../homeassistant/normalizer.js';
import type { Entity } from '../homeassistant/types.js';
import { getRecord, getString, type ToolArgs } from './args.js';
import { compactEntity } from './entities.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, type ToolResult } from './results.js';

async function callService(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const domain = getString(args, 'domain');
  if (!domain) {
    return errorResult('domain is required');
  }
  const service = getString(args, 'service');
  if (!service) {
    return errorResult('service is required');
  }

  let changed: Entity[];
  try {
    changed = await ctx.client.callService(domain, service, toConfigMapping(getRecord(args, 'data')), ctx.signal);
  } catch (error) {
    return errorResult(`Error calling service: ${errorMessage(error)}`);
  }

  return jsonResult(
    changed.map(compactEntity),
    'changed states',
    `Called ${domain}.${service}; ${changed.length} entities changed`
  );
}

export const serviceTools: ToolDefinition[] = [
  {
    name: 'call_service',
    description: 'Call any Home Assistant service, e.g. domain "light", service "turn_on", data {"entity_id": "light.hall"}.',
    inputSchema: {
      domain: z.string(),
      service: z.string(),
      data: z.record(z.string(), z.unknown()).optional().describe('Service data, including entity_id or other targets')
    },
    mutating: true,
    handler: callService
  }
];
