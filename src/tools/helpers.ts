import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import { isHelperPlatform, parseHelperEntityId } from '../homeassistant/entityId.js';
import { toConfigValue } from '../homeassistant/normalizer.js';
import { HELPER_PLATFORMS, type Entity } from '../homeassistant/types.js';
import { getBoolean, getString, getStringArray, requireDomainEntityId, type ToolArgs } from './args.js';
import { compactEntity } from './entities.js';
import { buildHelperConfig } from './helperConfig.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, listSummary, textResult, type ToolResult } from './results.js';

export const timeBlock = z.object({ from: z.string(), to: z.string() });

/** Optional per-platform fields accepted by create_helper and update_helper. */
export const helperFieldsSchema = {
  icon: z.string().optional().describe('Icon, e.g. mdi:toggle-switch'),
  initial: z.union([z.boolean(), z.number(), z.string()]).optional().describe('Initial value; type depends on platform'),
  min: z.number().optional().describe('input_number minimum value, input_text minimum length'),
  max: z.number().optional().describe('input_number maximum value, input_text maximum length'),
  step: z.number().optional().describe('input_number or counter step'),
  mode: z.string().optional().describe('input_number: slider|box; input_text: text|password'),
  unit_of_measurement: z.string().optional(),
  pattern: z.string().optional().describe('input_text regular expression'),
  options: z.array(z.string()).optional().describe('input_select options'),
  has_date: z.boolean().optional(),
  has_time: z.boolean().optional(),
  minimum: z.number().optional().describe('counter minimum'),
  maximum: z.number().optional().describe('counter maximum'),
  restore: z.boolean().optional().describe('counter or timer: restore state after restart'),
  duration: z.string().optional().describe('timer duration, e.g. 00:05:00'),
  monday: z.array(timeBlock).optional().describe('schedule blocks, e.g. [{"from": "07:00:00", "to": "09:00:00"}]'),
  tuesday: z.array(timeBlock).optional(),
  wednesday: z.array(timeBlock).optional(),
  thursday: z.array(timeBlock).optional(),
  friday: z.array(timeBlock).optional(),
  saturday: z.array(timeBlock).optional(),
  sunday: z.array(timeBlock).optional()
};

async function listHelpers(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  let helpers: Entity[];
  try {
    helpers = await ctx.client.listHelpers(ctx.signal);
  } catch (error) {
    return errorResult(`Error listing helpers: ${errorMessage(error)}`);
  }

  const platform = getString(args, 'platform');
  const verbose = getBoolean(args, 'verbose') ?? false;
  const filtered = platform ? helpers.filter((helper) => helper.entity_id.startsWith(`${platform}.`)) : helpers;

  return jsonResult(
    verbose ? filtered : filtered.map(compactEntity),
    'helpers',
    listSummary(filtered.length, 'helpers', verbose)
  );
}

async function createHelper(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const platform = getString(args, 'platform');
  if (!platform) {
    return errorResult('platform is required');
  }
  const id = getString(args, 'id');
  if (!id) {
    return errorResult('id is required');
  }
  const name = getString(args, 'name');
  if (!name) {
    return errorResult('name is required');
  }

  if (!isHelperPlatform(platform)) {
    return errorResult(`Unsupported helper platform: ${platform}`);
  }
  const config = buildHelperConfig(platform, name, args);

  try {
    await ctx.client.createHelper({ platform, id, config }, ctx.signal);
  } catch (error) {
    return errorResult(`Error creating helper: ${errorMessage(error)}`);
  }

  return textResult(`Helper '${name}' created successfully as ${platform}.${id}`);
}

async function updateHelper(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }
  const name = getString(args, 'name');
  if (!name) {
    return errorResult('name is required');
  }

  const helper = parseHelperEntityId(entityId);
  if (!helper) {
    return errorResult(`Unsupported helper platform: ${entityId}`);
  }
  const config = buildHelperConfig(helper.platform, name, args);

  try {
    await ctx.client.updateHelper(helper.id, { platform: helper.platform, id: helper.id, config }, ctx.signal);
  } catch (error) {
    return errorResult(`Error updating helper: ${errorMessage(error)}`);
  }

  return textResult(`Helper '${entityId}' updated successfully`);
}

async function deleteHelper(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }

  try {
    await ctx.client.deleteHelper(entityId, ctx.signal);
  } catch (error) {
    return errorResult(`Error deleting helper: ${errorMessage(error)}`);
  }

  return textResult(`Helper '${entityId}' deleted successfully`);
}

async function setHelperValue(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }
  if (args.value === undefined || args.value === null) {
    return errorResult('value is required');
  }

  try {
    await ctx.client.setHelperValue(entityId, toConfigValue(args.value), ctx.signal);
  } catch (error) {
    return errorResult(`Error setting helper value: ${errorMessage(error)}`);
  }

  return textResult(`Value set successfully for '${entityId}'`);
}

async function toggleInputBoolean(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'input_boolean', 'input_boolean.my_switch');
  if ('error' in checked) {
    return errorResult(checked.error);
  }

  try {
    await ctx.client.callService('input_boolean', 'toggle', { entity_id: checked.entityId }, ctx.signal);
  } catch (error) {
    return errorResult(`Error toggling input_boolean: ${errorMessage(error)}`);
  }

  return textResult(`Input boolean '${checked.entityId}' toggled successfully`);
}

async function selectOption(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'input_select', 'input_select.my_dropdown');
  if ('error' in checked) {
    return errorResult(checked.error);
  }
  const option = getString(args, 'option');
  if (!option) {
    return errorResult('option is required');
  }

  try {
    await ctx.client.callService('input_select', 'select_option', { entity_id: checked.entityId, option }, ctx.signal);
  } catch (error) {
    return errorResult(`Error selecting option: ${errorMessage(error)}`);
  }

  return textResult(`Option '${option}' selected successfully for '${checked.entityId}'`);
}

async function setOptions(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'input_select', 'input_select.my_dropdown');
  if ('error' in checked) {
    return errorResult(checked.error);
  }
  const raw = args.options;
  if (!Array.isArray(raw) || raw.length === 0) {
    return errorResult('options is required and must be a non-empty array');
  }
  const options = getStringArray(args, 'options') ?? [];
  if (options.length === 0) {
    return errorResult('options must contain at least one string value');
  }

  try {
    await ctx.client.callService('input_select', 'set_options', { entity_id: checked.entityId, options }, ctx.signal);
  } catch (error) {
    return errorResult(`Error setting options: ${errorMessage(error)}`);
  }

  return textResult(`Options updated successfully for '${checked.entityId}'`);
}

type CounterService = 'increment' | 'decrement' | 'reset';

const COUNTER_PAST_TENSE: Record<CounterService, string> = {
  increment: 'incremented',
  decrement: 'decremented',
  reset: 'reset'
};

const COUNTER_GERUND: Record<CounterService, string> = {
  increment: 'incrementing',
  decrement: 'decrementing',
  reset: 'resetting'
};

function counterControl(service: CounterService): ToolDefinition['handler'] {
  return async (ctx, args) => {
    const checked = requireDomainEntityId(args, 'counter', 'counter.my_counter');
    if ('error' in checked) {
      return errorResult(checked.error);
    }

    try {
      await ctx.client.callService('counter', service, { entity_id: checked.entityId }, ctx.signal);
    } catch (error) {
      return errorResult(`Error ${COUNTER_GERUND[service]} counter: ${errorMessage(error)}`);
    }

    return textResult(`Counter '${checked.entityId}' ${COUNTER_PAST_TENSE[service]} successfully`);
  };
}

async function pressInputButton(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const checked = requireDomainEntityId(args, 'input_button', 'input_button.my_button');
  if ('error' in checked) {
    return errorResult(checked.error);
  }

  try {
    await ctx.client.callService('input_button', 'press', { entity_id: checked.entityId }, ctx.signal);
  } catch (error) {
    return errorResult(`Error pressing input_button: ${errorMessage(error)}`);
  }

  return textResult(`Input button '${checked.entityId}' pressed successfully`);
}

export const helperTools: ToolDefinition[] = [
  {
    name: 'list_helpers',
    description: `List helper entities (${HELPER_PLATFORMS.join(', ')}).`,
    inputSchema: {
      platform: z.string().optional().describe('Only helpers of this platform, e.g. "input_boolean"'),
      verbose: z.boolean().optional()
    },
    mutating: false,
    handler: listHelpers
  },
  {
    name: 'create_helper',
    description: `Create a helper. Supported platforms: ${HELPER_PLATFORMS.join(', ')}. Platform-specific fields are optional.`,
    inputSchema: {
      platform: z.string().describe('Helper platform, e.g. "input_number"'),
      id: z.string().describe('Object id without the platform prefix'),
      name: z.string(),
      ...helperFieldsSchema
    },
    mutating: true,
    handler: createHelper
  },
  {
    name: 'update_helper',
    description: 'Update a helper; the platform is taken from the entity id.',
    inputSchema: {
      entity_id: z.string().describe('Helper entity id, e.g. input_number.volume'),
      name: z.string(),
      ...helperFieldsSchema
    },
    mutating: true,
    handler: updateHelper
  },
  {
    name: 'delete_helper',
    description: 'Delete a helper by entity id.',
    inputSchema: {
      entity_id: z.string()
    },
    mutating: true,
    handler: deleteHelper
  },
  {
    name: 'set_helper_value',
    description:
      'Set the value of an input_boolean, input_number, input_text, input_select, input_datetime or counter helper.',
    inputSchema: {
      entity_id: z.string(),
      value: z
        .union([z.boolean(), z.number(), z.string(), z.record(z.string(), z.unknown())])
        .describe('Boolean, number, option, text, or for input_datetime a datetime string or {date, time}')
    },
    mutating: true,
    handler: setHelperValue
  },
  {
    name: 'toggle_input_boolean',
    description: 'Toggle an input_boolean between on and off.',
    inputSchema: {
      entity_id: z.string().describe('e.g. input_boolean.guest_mode')
    },
    mutating: true,
    handler: toggleInputBoolean
  },
  {
    name: 'select_option',
    description: 'Select an option of an input_select.',
    inputSchema: {
      entity_id: z.string().describe('e.g. input_select.house_mode'),
      option: z.string()
    },
    mutating: true,
    handler: selectOption
  },
  {
    name: 'set_options',
    description: 'Replace the options of an input_select.',
    inputSchema: {
      entity_id: z.string(),
      options: z.array(z.string())
    },
    mutating: true,
    handler: setOptions
  },
  {
    name: 'increment_counter',
    description: 'Increment a counter by its step.',
    inputSchema: {
      entity_id: z.string().describe('e.g. counter.coffee_cups')
    },
    mutating: true,
    handler: counterControl('increment')
  },
  {
    name: 'decrement_counter',
    description: 'Decrement a counter by its step.',
    inputSchema: {
      entity_id: z.string().describe('e.g. counter.coffee_cups')
    },
    mutating: true,
    handler: counterControl('decrement')
  },
  {
    name: 'reset_counter',
    description: 'Reset a counter to its initial value.',
    inputSchema: {
      entity_id: z.string().describe('e.g. counter.coffee_cups')
    },
    mutating: true,
    handler: counterControl('reset')
  },
  {
    name: 'press_input_button',
    description: 'Press an input_button.',
    inputSchema: {
      entity_id: z.string().describe('e.g. input_button.doorbell')
    },
    mutating: true,
    handler: pressInputButton
  }
];
