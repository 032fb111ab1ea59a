import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import type { Target } from '../homeassistant/types.js';
import { getBoolean, getStringArray, type ToolArgs } from './args.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, type ToolResult } from './results.js';

const TARGET_KEYS = ['entity_id', 'device_id', 'area_id', 'label_id'] as const;

export function parseTarget(args: ToolArgs): Target | undefined {
  const target: Target = {};
  for (const key of TARGET_KEYS) {
    const values = getStringArray(args, key);
    if (values && values.length > 0) {
      target[key] = values;
    }
  }
  return Object.keys(target).length > 0 ? target : undefined;
}

type TargetQuery = (ctx: ToolContext, target: Target, expandGroup: boolean | undefined) => Promise<unknown>;

function targetTool(name: string, description: string, failure: string, query: TargetQuery): ToolDefinition {
  return {
    name,
    description,
    inputSchema: {
      entity_id: z.array(z.string()).optional(),
      device_id: z.array(z.string()).optional(),
      area_id: z.array(z.string()).optional(),
      label_id: z.array(z.string()).optional(),
      expand_group: z.boolean().optional().describe('Expand groups to their members (Home Assistant default: true)')
    },
    mutating: false,
    async handler(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
      const target = parseTarget(args);
      if (!target) {
        return errorResult('Invalid parameters: at least one of entity_id, device_id, area_id, or label_id is required');
      }

      let result: unknown;
      try {
        result = await query(ctx, target, getBoolean(args, 'expand_group'));
      } catch (error) {
        return errorResult(`${failure}: ${errorMessage(error)}`);
      }
      return jsonResult(result, 'response');
    }
  };
}

export const targetTools: ToolDefinition[] = [
  targetTool(
    'get_triggers_for_target',
    'List the trigger types that apply to the given entities, devices, areas or labels.',
    'Error getting triggers for target',
    (ctx, target, expandGroup) => ctx.client.getTriggersForTarget(target, expandGroup, ctx.signal)
  ),
  targetTool(
    'get_conditions_for_target',
    'List the condition types that apply to the given entities, devices, areas or labels.',
    'Error getting conditions for target',
    (ctx, target, expandGroup) => ctx.client.getConditionsForTarget(target, expandGroup, ctx.signal)
  ),
  targetTool(
    'get_services_for_target',
    'List the services that can act on the given entities, devices, areas or labels.',
    'Error getting services for target',
    (ctx, target, expandGroup) => ctx.client.getServicesForTarget(target, expandGroup, ctx.signal)
  ),
  targetTool(
    'extract_from_target',
    'Resolve a target to the entities, devices and areas it refers to, and report missing references.',
    'Error extracting from target',
    (ctx, target, expandGroup) => ctx.client.extractFromTarget(target, expandGroup, ctx.signal)
  )
];
