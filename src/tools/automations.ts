import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import { stripAutomationPrefix } from '../homeassistant/entityId.js';
import { toConfigArray } from '../homeassistant/normalizer.js';
import { AUTOMATION_MODES, type Automation, type AutomationConfig } from '../homeassistant/types.js';
import { getBoolean, getOptionalString, getString, type ToolArgs } from './args.js';
import { generateAutomationId } from './automationId.js';
import { automationReferencesEntity } from './entitySearch.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, listSummary, textResult, type ToolResult } from './results.js';

const configSequence = z.array(z.record(z.string(), z.unknown()));

interface CompactAutomationEntry {
  entity_id: string;
  state?: string;
  alias?: string;
  last_triggered?: string;
}

interface VerboseAutomationEntry {
  entity_id: string;
  state?: string;
  friendly_name?: string;
  last_triggered?: string;
  config?: AutomationConfig;
}

function compactEntry(automation: Automation): CompactAutomationEntry {
  return {
    entity_id: automation.entity_id,
    state: automation.state || undefined,
    alias: automation.friendly_name || undefined,
    last_triggered: automation.last_triggered || undefined
  };
}

async function fetchConfig(ctx: ToolContext, automation: Automation): Promise<AutomationConfig | undefined> {
  try {
    const detail = await ctx.client.getAutomation(stripAutomationPrefix(automation.entity_id), ctx.signal);
    return detail.config;
  } catch (error) {
    ctx.logger.warn(
      { entityId: automation.entity_id, error: errorMessage(error) },
      'Could not read automation configuration'
    );
    return undefined;
  }
}

async function listAutomations(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  let automations: Automation[];
  try {
    automations = await ctx.client.listAutomations(ctx.signal);
  } catch (error) {
    return errorResult(`Error listing automations: ${errorMessage(error)}`);
  }

  const state = getString(args, 'state');
  const alias = getString(args, 'alias').toLowerCase();
  const entityId = getString(args, 'entity_id');
  const verbose = getBoolean(args, 'verbose') ?? false;

  let filtered = automations.filter(
    (automation) =>
      (!state || automation.state === state) &&
      (!alias || (automation.friendly_name ?? '').toLowerCase().includes(alias))
  );

  // Configs are fetched one at a time; a failure excludes only that automation.
  const configs = new Map<string, AutomationConfig>();
  let skipped = 0;
  if (entityId) {
    const matching: Automation[] = [];
    for (const automation of filtered) {
      const config = await fetchConfig(ctx, automation);
      if (!config) {
        skipped += 1;
        continue;
      }
      configs.set(automation.entity_id, config);
      if (automationReferencesEntity(config, entityId)) {
        matching.push(automation);
      }
    }
    filtered = matching;
  }

  let summary = listSummary(filtered.length, 'automations', verbose);
  if (skipped > 0) {
    summary += `; skipped ${skipped} automations whose configuration could not be read`;
  }

  if (!verbose) {
    return jsonResult(filtered.map(compactEntry), 'automations', summary);
  }

  const entries: VerboseAutomationEntry[] = [];
  for (const automation of filtered) {
    const config = configs.get(automation.entity_id) ?? (await fetchConfig(ctx, automation));
    entries.push({
      entity_id: automation.entity_id,
      state: automation.state,
      friendly_name: automation.friendly_name,
      last_triggered: automation.last_triggered,
      config
    });
  }
  return jsonResult(entries, 'automations', summary);
}

/** Looks an automation up by entity id first, then by its config id. */
async function findAutomationById(ctx: ToolContext, searchId: string): Promise<Automation> {
  const automations = await ctx.client.listAutomations(ctx.signal);

  if (searchId.startsWith('automation.') && automations.some((automation) => automation.entity_id === searchId)) {
    return ctx.client.getAutomation(stripAutomationPrefix(searchId), ctx.signal);
  }

  for (const automation of automations) {
    let detail: Automation;
    try {
      detail = await ctx.client.getAutomation(stripAutomationPrefix(automation.entity_id), ctx.signal);
    } catch (error) {
      ctx.logger.debug({ entityId: automation.entity_id, error: errorMessage(error) }, 'Skipping unreadable automation');
      continue;
    }
    if (detail.config?.id === searchId) {
      return detail;
    }
  }

  throw new Error(`automation not found with ID: ${searchId} (tried as automation_id, entity_id, and config.id)`);
}

async function getAutomation(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const automationId = getString(args, 'automation_id');
  if (!automationId) {
    return errorResult('automation_id is required');
  }

  let automation: Automation;
  try {
    automation = await ctx.client.getAutomation(stripAutomationPrefix(automationId), ctx.signal);
  } catch (directError) {
    ctx.logger.debug({ automationId, error: errorMessage(directError) }, 'Direct automation lookup failed; scanning');
    try {
      automation = await findAutomationById(ctx, automationId);
    } catch (error) {
      return errorResult(`Error getting automation: ${errorMessage(error)}`);
    }
  }

  return jsonResult(automation, 'automation');
}

async function createAutomation(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const alias = getString(args, 'alias');
  if (!alias) {
    return errorResult('alias is required');
  }

  const triggers = toConfigArray(args.trigger);
  if (!triggers || triggers.length === 0) {
    return errorResult('trigger is required');
  }

  const actions = toConfigArray(args.action);
  if (!actions || actions.length === 0) {
    return errorResult('action is required');
  }

  const id = generateAutomationId(alias);
  if (!id) {
    return errorResult('alias must contain at least one letter or digit');
  }

  const description = getString(args, 'description');
  const mode = getString(args, 'mode');
  const conditions = toConfigArray(args.condition);
  const config: AutomationConfig = {
    id,
    alias,
    ...(description ? { description } : {}),
    ...(mode ? { mode } : {}),
    triggers,
    ...(conditions ? { conditions } : {}),
    actions
  };

  try {
    await ctx.client.createAutomation(config, ctx.signal);
  } catch (error) {
    return errorResult(`Error creating automation: ${errorMessage(error)}`);
  }

  return textResult(`Automation '${alias}' created successfully with ID '${id}'`);
}

async function updateAutomation(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const automationId = getString(args, 'automation_id');
  if (!automationId) {
    return errorResult('automation_id is required');
  }

  let current: Automation;
  try {
    current = await ctx.client.getAutomation(stripAutomationPrefix(automationId), ctx.signal);
  } catch (error) {
    return errorResult(`Error getting current automation: ${errorMessage(error)}`);
  }

  const config: AutomationConfig = { ...(current.config ?? { id: automationId }) };

  const alias = getString(args, 'alias');
  if (alias) {
    config.alias = alias;
  }
  const description = getOptionalString(args, 'description');
  if (description !== undefined) {
    config.description = description;
  }
  const triggers = toConfigArray(args.trigger);
  if (triggers && triggers.length > 0) {
    config.triggers = triggers;
  }
  const conditions = toConfigArray(args.condition);
  if (conditions) {
    config.conditions = conditions;
  }
  const actions = toConfigArray(args.action);
  if (actions && actions.length > 0) {
    config.actions = actions;
  }
  const mode = getString(args, 'mode');
  if (mode) {
    config.mode = mode;
  }

  try {
    await ctx.client.updateAutomation(config.id ?? stripAutomationPrefix(automationId), config, ctx.signal);
  } catch (error) {
    return errorResult(`Error updating automation: ${errorMessage(error)}`);
  }

  return textResult(`Automation '${automationId}' updated successfully`);
}

async function deleteAutomation(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const automationId = getString(args, 'automation_id');
  if (!automationId) {
    return errorResult('automation_id is required');
  }

  try {
    await ctx.client.deleteAutomation(automationId, ctx.signal);
  } catch (error) {
    return errorResult(`Error deleting automation: ${errorMessage(error)}`);
  }

  return textResult(`Automation '${automationId}' deleted successfully`);
}

async function toggleAutomation(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const automationId = getString(args, 'automation_id');
  if (!automationId) {
    return errorResult('automation_id is required');
  }

  const enabled = getBoolean(args, 'enabled');
  if (enabled === undefined) {
    return errorResult('enabled is required');
  }

  try {
    await ctx.client.toggleAutomation(automationId, enabled, ctx.signal);
  } catch (error) {
    return errorResult(`Error toggling automation: ${errorMessage(error)}`);
  }

  return textResult(`Automation '${automationId}' ${enabled ? 'enabled' : 'disabled'} successfully`);
}

export const automationTools: ToolDefinition[] = [
  {
    name: 'list_automations',
    description:
      'List Home Assistant automations. Filters combine with AND: state (on/off), alias (case-insensitive substring), entity_id (automations that reference the entity).',
    inputSchema: {
      state: z.string().optional().describe('Only automations in this state, e.g. "on" or "off"'),
      alias: z.string().optional().describe('Case-insensitive substring of the automation name'),
      entity_id: z.string().optional().describe('Only automations whose triggers, conditions or actions use this entity'),
      verbose: z.boolean().optional().describe('Include the full configuration of each automation')
    },
    mutating: false,
    handler: listAutomations
  },
  {
    name: 'get_automation',
    description: 'Get one automation with its full configuration, by automation id, entity id or config id.',
    inputSchema: {
      automation_id: z.string().describe('Automation id, e.g. "morning_lights" or "automation.morning_lights"')
    },
    mutating: false,
    handler: getAutomation
  },
  {
    name: 'create_automation',
    description: 'Create an automation. The id is derived from the alias.',
    inputSchema: {
      alias: z.string().describe('Name of the automation'),
      description: z.string().optional(),
      trigger: configSequence.describe('Triggers, e.g. [{"trigger": "state", "entity_id": "binary_sensor.door"}]'),
      condition: configSequence.optional(),
      action: configSequence.describe('Actions, e.g. [{"action": "light.turn_on", "target": {"entity_id": "light.hall"}}]'),
      mode: z.enum(AUTOMATION_MODES).optional()
    },
    mutating: true,
    handler: createAutomation
  },
  {
    name: 'update_automation',
    description: 'Update an automation. Only the provided fields change; the rest of the configuration is kept.',
    inputSchema: {
      automation_id: z.string(),
      alias: z.string().optional(),
      description: z.string().optional(),
      trigger: configSequence.optional(),
      condition: configSequence.optional(),
      action: configSequence.optional(),
      mode: z.enum(AUTOMATION_MODES).optional()
    },
    mutating: true,
    handler: updateAutomation
  },
  {
    name: 'delete_automation',
    description: 'Delete an automation by its config id.',
    inputSchema: {
      automation_id: z.string()
    },
    mutating: true,
    handler: deleteAutomation
  },
  {
    name: 'toggle_automation',
    description: 'Enable or disable an automation.',
    inputSchema: {
      automation_id: z.string(),
      enabled: z.boolean()
    },
    mutating: true,
    handler: toggleAutomation
  }
];
