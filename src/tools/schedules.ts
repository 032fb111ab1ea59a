import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import { getStringAttribute, isRecord, toStringValue } from '../homeassistant/normalizer.js';
import type { ConfigMapping, Entity } from '../homeassistant/types.js';
import { getString, requireDomainEntityId, type ToolArgs } from './args.js';
import { buildHelperConfig, SCHEDULE_DAYS, type ScheduleDay } from './helperConfig.js';
import { timeBlock } from './helpers.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, textResult, type ToolResult } from './results.js';

const SCHEDULE_EXAMPLE = 'schedule.work_hours';

interface TimeBlock {
  from: string;
  to: string;
}

type ScheduleDetails = {
  entity_id: string;
  state: string;
  friendly_name?: string;
  icon?: string;
  next_event?: string;
} & Partial<Record<ScheduleDay, TimeBlock[]>>;

export function buildScheduleDetails(state: Entity, config: ConfigMapping): ScheduleDetails {
  const details: ScheduleDetails = {
    entity_id: state.entity_id,
    state: state.state,
    friendly_name: getStringAttribute(state.attributes, 'friendly_name'),
    icon: getStringAttribute(state.attributes, 'icon'),
    next_event: getStringAttribute(state.attributes, 'next_event')
  };

  for (const day of SCHEDULE_DAYS) {
    const blocks: unknown = config[day];
    if (Array.isArray(blocks) && blocks.length > 0) {
      details[day] = blocks.filter(isRecord).map((block) => ({
        from: toStringValue(block.from),
        to: toStringValue(block.to)
      }));
    }
  }
  return details;
}

async function getScheduleDetails(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'schedule', SCHEDULE_EXAMPLE);
  if ('error' in checked) {
    return errorResult(checked.error);
  }

  let state: Entity;
  try {
    state = await ctx.client.getState(checked.entityId, ctx.signal);
  } catch (error) {
    return errorResult(`Error getting schedule state: ${errorMessage(error)}`);
  }

  // Schedules defined in YAML have no stored config; report the state alone.
  let config: ConfigMapping = {};
  try {
    config = await ctx.client.getScheduleConfig(checked.entityId, ctx.signal);
  } catch (error) {
    ctx.logger.debug({ entityId: checked.entityId, error: errorMessage(error) }, 'Schedule configuration unavailable');
  }

  return jsonResult(buildScheduleDetails(state, config), 'schedule');
}

async function createSchedule(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const id = getString(args, 'id');
  if (!id) {
    return errorResult('id is required');
  }
  const name = getString(args, 'name');
  if (!name) {
    return errorResult('name is required');
  }

  const config = buildHelperConfig('schedule', name, args);
  try {
    await ctx.client.createHelper({ platform: 'schedule', id, config }, ctx.signal);
  } catch (error) {
    return errorResult(`Error creating schedule: ${errorMessage(error)}`);
  }

  return textResult(`Schedule '${name}' created successfully as schedule.${id}`);
}

async function deleteSchedule(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'schedule', SCHEDULE_EXAMPLE);
  if ('error' in checked) {
    return errorResult(checked.error);
  }

  try {
    await ctx.client.deleteHelper(checked.entityId, ctx.signal);
  } catch (error) {
    return errorResult(`Error deleting schedule: ${errorMessage(error)}`);
  }

  return textResult(`Schedule '${checked.entityId}' deleted successfully`);
}

async function reloadSchedule(ctx: ToolContext): Promise<ToolResult> {
  try {
    await ctx.client.callService('schedule', 'reload', {}, ctx.signal);
  } catch (error) {
    return errorResult(`Error reloading schedules: ${errorMessage(error)}`);
  }
  return textResult('Schedules reloaded successfully');
}

const dayBlocks = z.array(timeBlock).optional().describe('Time blocks, e.g. [{"from": "08:00:00", "to": "17:00:00"}]');

export const scheduleTools: ToolDefinition[] = [
  {
    name: 'get_schedule_details',
    description: 'Get a schedule helper with its current state and the time blocks of each weekday.',
    inputSchema: {
      entity_id: z.string().describe(`Schedule entity id, e.g. ${SCHEDULE_EXAMPLE}`)
    },
    mutating: false,
    handler: getScheduleDetails
  },
  {
    name: 'create_schedule',
    description: 'Create a schedule helper from weekly time blocks.',
    inputSchema: {
      id: z.string().describe('Object id without the "schedule." prefix'),
      name: z.string(),
      icon: z.string().optional(),
      monday: dayBlocks,
      tuesday: dayBlocks,
      wednesday: dayBlocks,
      thursday: dayBlocks,
      friday: dayBlocks,
      saturday: dayBlocks,
      sunday: dayBlocks
    },
    mutating: true,
    handler: createSchedule
  },
  {
    name: 'delete_schedule',
    description: 'Delete a schedule helper.',
    inputSchema: {
      entity_id: z.string()
    },
    mutating: true,
    handler: deleteSchedule
  },
  {
    name: 'reload_schedule',
    description: 'Reload schedule helpers from configuration.',
    inputSchema: {},
    mutating: true,
    handler: reloadSchedule
  }
];
