import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import type { ConfigMapping } from '../homeassistant/types.js';
import { getString, requireDomainEntityId, type ToolArgs } from './args.js';
import { buildHelperConfig } from './helperConfig.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, textResult, type ToolResult } from './results.js';

const TIMER_EXAMPLE = 'timer.my_timer';

type TimerService = 'start' | 'pause' | 'cancel' | 'finish';

const SERVICE_WORDING: Record<TimerService, { doing: string; done: string }> = {
  start: { doing: 'starting', done: 'started' },
  pause: { doing: 'pausing', done: 'paused' },
  cancel: { doing: 'canceling', done: 'canceled' },
  finish: { doing: 'finishing', done: 'finished' }
};

async function createTimer(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const id = getString(args, 'id');
  if (!id) {
    return errorResult('id is required');
  }
  const name = getString(args, 'name');
  if (!name) {
    return errorResult('name is required');
  }

  const config = buildHelperConfig('timer', name, args);
  try {
    await ctx.client.createHelper({ platform: 'timer', id, config }, ctx.signal);
  } catch (error) {
    return errorResult(`Error creating timer: ${errorMessage(error)}`);
  }

  return textResult(`Timer '${name}' created successfully as timer.${id}`);
}

async function deleteTimer(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'timer', TIMER_EXAMPLE);
  if ('error' in checked) {
    return errorResult(checked.error);
  }

  try {
    await ctx.client.deleteHelper(checked.entityId, ctx.signal);
  } catch (error) {
    return errorResult(`Error deleting timer: ${errorMessage(error)}`);
  }

  return textResult(`Timer '${checked.entityId}' deleted successfully`);
}

function timerControl(service: TimerService): ToolDefinition['handler'] {
  const wording = SERVICE_WORDING[service];
  return async (ctx, args) => {
    const checked = requireDomainEntityId(args, 'timer', TIMER_EXAMPLE);
    if ('error' in checked) {
      return errorResult(checked.error);
    }

    const data: ConfigMapping = { entity_id: checked.entityId };
    const duration = getString(args, 'duration');
    if (service === 'start' && duration) {
      data.duration = duration;
    }

    try {
      await ctx.client.callService('timer', service, data, ctx.signal);
    } catch (error) {
      return errorResult(`Error ${wording.doing} timer: ${errorMessage(error)}`);
    }

    return textResult(`Timer '${checked.entityId}' ${wording.done} successfully`);
  };
}

async function changeTimer(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'timer', TIMER_EXAMPLE);
  if ('error' in checked) {
    return errorResult(checked.error);
  }
  const duration = getString(args, 'duration');
  if (!duration) {
    return errorResult('duration is required');
  }

  try {
    await ctx.client.callService('timer', 'change', { entity_id: checked.entityId, duration }, ctx.signal);
  } catch (error) {
    return errorResult(`Error changing timer: ${errorMessage(error)}`);
  }

  return textResult(`Timer '${checked.entityId}' duration changed by ${duration} successfully`);
}

const timerEntity = z.string().describe(`Timer entity id, e.g. ${TIMER_EXAMPLE}`);

export const timerTools: ToolDefinition[] = [
  {
    name: 'create_timer',
    description: 'Create a timer helper.',
    inputSchema: {
      id: z.string().describe('Object id without the "timer." prefix'),
      name: z.string(),
      duration: z.string().optional().describe('Default duration, HH:MM:SS'),
      restore: z.boolean().optional().describe('Restore the timer after a restart'),
      icon: z.string().optional()
    },
    mutating: true,
    handler: createTimer
  },
  {
    name: 'delete_timer',
    description: 'Delete a timer helper.',
    inputSchema: { entity_id: timerEntity },
    mutating: true,
    handler: deleteTimer
  },
  {
    name: 'start_timer',
    description: 'Start or restart a timer, optionally with a duration other than its default.',
    inputSchema: {
      entity_id: timerEntity,
      duration: z.string().optional().describe('HH:MM:SS')
    },
    mutating: true,
    handler: timerControl('start')
  },
  {
    name: 'pause_timer',
    description: 'Pause a running timer.',
    inputSchema: { entity_id: timerEntity },
    mutating: true,
    handler: timerControl('pause')
  },
  {
    name: 'cancel_timer',
    description: 'Cancel a timer without firing timer.finished.',
    inputSchema: { entity_id: timerEntity },
    mutating: true,
    handler: timerControl('cancel')
  },
  {
    name: 'finish_timer',
    description: 'Finish a running timer early; fires timer.finished.',
    inputSchema: { entity_id: timerEntity },
    mutating: true,
    handler: timerControl('finish')
  },
  {
    name: 'change_timer',
    description: 'Add to or subtract from the remaining time of a running timer, e.g. "00:01:00" or "-00:00:30".',
    inputSchema: {
      entity_id: timerEntity,
      duration: z.string()
    },
    mutating: true,
    handler: changeTimer
  }
];
