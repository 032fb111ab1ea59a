import * as z from 'zod/v4';

import { errorMessage } from '../errors.js';
import { entityDomain, stripAutomationPrefix } from '../homeassistant/entityId.js';
import { getStringAttribute } from '../homeassistant/normalizer.js';
import type { Automation, DomainCount, Entity, HistoryEntry } from '../homeassistant/types.js';
import { getBoolean, getNumber, getString, type ToolArgs } from './args.js';
import { findAutomationUsage, type UsageKind } from './entitySearch.js';
import type { ToolContext, ToolDefinition } from './registry.js';
import { errorResult, jsonResult, listSummary, VERBOSE_HINT, type ToolResult } from './results.js';

const DEFAULT_HISTORY_HOURS = 24;
const HOUR_MS = 60 * 60 * 1000;

const rfc3339 = z.iso.datetime({ offset: true });

interface CompactEntity {
  entity_id: string;
  state: string;
  friendly_name?: string;
}

interface EntityDependency {
  automation_id: string;
  automation_alias?: string;
  used_in: UsageKind[];
}

interface EntityDependencies {
  entity_id: string;
  automations: EntityDependency[];
  total_usages: number;
  skipped_automations?: string[];
}

export function compactEntity(entity: Entity): CompactEntity {
  return {
    entity_id: entity.entity_id,
    state: entity.state,
    friendly_name: getStringAttribute(entity.attributes, 'friendly_name')
  };
}

export interface EntityFilter {
  domain?: string;
  state?: string;
  stateNot?: string;
  nameContains?: string;
}

export function matchesEntityFilter(entity: Entity, filter: EntityFilter): boolean {
  if (filter.domain && !entity.entity_id.startsWith(`${filter.domain}.`)) {
    return false;
  }
  if (filter.state && entity.state !== filter.state) {
    return false;
  }
  if (filter.stateNot && entity.state === filter.stateNot) {
    return false;
  }
  if (filter.nameContains) {
    const needle = filter.nameContains.toLowerCase();
    const friendlyName = (getStringAttribute(entity.attributes, 'friendly_name') ?? '').toLowerCase();
    if (!entity.entity_id.toLowerCase().includes(needle) && !friendlyName.includes(needle)) {
      return false;
    }
  }
  return true;
}

async function getStates(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  let states: Entity[];
  try {
    states = await ctx.client.getStates(ctx.signal);
  } catch (error) {
    return errorResult(`Error getting states: ${errorMessage(error)}`);
  }

  const verbose = getBoolean(args, 'verbose') ?? false;
  const filtered = states.filter((entity) =>
    matchesEntityFilter(entity, {
      domain: getString(args, 'domain'),
      state: getString(args, 'state'),
      stateNot: getString(args, 'state_not'),
      nameContains: getString(args, 'name_contains')
    })
  );

  const summary = listSummary(filtered.length, 'entities', verbose);
  return jsonResult(verbose ? filtered : filtered.map(compactEntity), 'states', summary);
}

async function getState(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }

  try {
    const entity = await ctx.client.getState(entityId, ctx.signal);
    return jsonResult(entity, 'state');
  } catch (error) {
    return errorResult(`Error getting state: ${errorMessage(error)}`);
  }
}

interface HistoryWindow {
  start: Date;
  end: Date;
}

/** `hours` wins over `start_time`; the default window is the last 24 hours. */
export function resolveHistoryWindow(args: ToolArgs, now: Date): HistoryWindow | string {
  let end = now;
  const endRaw = getString(args, 'end_time');
  if (endRaw) {
    if (!rfc3339.safeParse(endRaw).success) {
      return `invalid end_time format: ${endRaw}`;
    }
    end = new Date(endRaw);
  }

  const hours = getNumber(args, 'hours');
  if (hours !== undefined && hours > 0) {
    return { start: new Date(end.getTime() - hours * HOUR_MS), end };
  }

  const startRaw = getString(args, 'start_time');
  if (startRaw) {
    if (!rfc3339.safeParse(startRaw).success) {
      return `invalid start_time format: ${startRaw}`;
    }
    return { start: new Date(startRaw), end };
  }

  return { start: new Date(end.getTime() - DEFAULT_HISTORY_HOURS * HOUR_MS), end };
}

export function historySummary(
  entityId: string,
  shown: number,
  total: number,
  stateFilter: string,
  verbose: boolean
): string {
  let summary =
    total > shown
      ? `Showing ${shown} of ${total} history entries for ${entityId} (limited)`
      : `Found ${shown} history entries for ${entityId}`;
  if (stateFilter) {
    summary += ` (filtered by state='${stateFilter}')`;
  }
  if (!verbose) {
    summary += VERBOSE_HINT;
  }
  return summary;
}

async function getHistory(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }

  const window = resolveHistoryWindow(args, new Date());
  if (typeof window === 'string') {
    return errorResult(window);
  }

  let history: HistoryEntry[][];
  try {
    history = await ctx.client.getHistory(entityId, window.start, window.end, ctx.signal);
  } catch (error) {
    return errorResult(`Error getting history: ${errorMessage(error)}`);
  }

  const stateFilter = getString(args, 'state');
  const matching = history.flat().filter((entry) => !stateFilter || entry.state === stateFilter);

  const limitRaw = getNumber(args, 'limit');
  const limit = limitRaw !== undefined && limitRaw > 0 ? Math.floor(limitRaw) : 0;
  // History is oldest first, so the limit keeps the tail.
  const entries = limit > 0 && matching.length > limit ? matching.slice(matching.length - limit) : matching;

  const verbose = getBoolean(args, 'verbose') ?? false;
  const output = verbose
    ? entries
    : entries.map((entry) => ({ state: entry.state, last_changed: entry.last_changed }));

  return jsonResult(output, 'history', historySummary(entityId, entries.length, matching.length, stateFilter, verbose));
}

export function countDomains(states: Entity[]): DomainCount[] {
  const counts = new Map<string, number>();
  for (const entity of states) {
    const domain = entityDomain(entity.entity_id);
    if (domain) {
      counts.set(domain, (counts.get(domain) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([domain, count]) => ({ domain, entity_count: count }));
}

async function listDomains(ctx: ToolContext): Promise<ToolResult> {
  try {
    const states = await ctx.client.getStates(ctx.signal);
    return jsonResult(countDomains(states), 'domains');
  } catch (error) {
    return errorResult(`Error getting states: ${errorMessage(error)}`);
  }
}

interface AutomationUsage {
  automation: Automation;
  alias?: string;
  usedIn: UsageKind[];
}

/** Reads each automation's config in turn; unreadable ones are returned as skipped. */
async function scanAutomationUsage(
  ctx: ToolContext,
  automations: Automation[],
  entityId: string
): Promise<{ usages: AutomationUsage[]; skipped: string[] }> {
  const usages: AutomationUsage[] = [];
  const skipped: string[] = [];
  for (const automation of automations) {
    const automationId = stripAutomationPrefix(automation.entity_id);
    let config;
    try {
      config = (await ctx.client.getAutomation(automationId, ctx.signal)).config ?? {};
    } catch (error) {
      ctx.logger.warn({ automationId, error: errorMessage(error) }, 'Could not read automation configuration');
      skipped.push(automation.entity_id);
      continue;
    }

    const usedIn = findAutomationUsage(config, entityId);
    if (usedIn.length > 0) {
      usages.push({ automation, alias: config.alias || automation.friendly_name, usedIn });
    }
  }
  return { usages, skipped };
}

async function getEntityDependencies(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }

  let automations: Automation[];
  try {
    automations = await ctx.client.listAutomations(ctx.signal);
  } catch (error) {
    return errorResult(`Error listing automations: ${errorMessage(error)}`);
  }

  const { usages, skipped } = await scanAutomationUsage(ctx, automations, entityId);
  const dependencies: EntityDependency[] = usages.map((usage) => ({
    automation_id: stripAutomationPrefix(usage.automation.entity_id),
    automation_alias: usage.alias,
    used_in: usage.usedIn
  }));

  const result: EntityDependencies = {
    entity_id: entityId,
    automations: dependencies,
    total_usages: dependencies.length,
    ...(skipped.length > 0 ? { skipped_automations: skipped } : {})
  };
  return jsonResult(result, 'result', `Found ${dependencies.length} automations using '${entityId}'`);
}

interface AutomationReference {
  entity_id: string;
  alias?: string;
  state?: string;
  last_triggered?: string;
  used_in: UsageKind[];
}

interface MemberReference {
  entity_id: string;
  friendly_name?: string;
}

interface EntityReferences {
  automations: AutomationReference[];
  scenes: MemberReference[];
  groups: string[];
  total_references: number;
  skipped_automations?: string[];
}

export interface EntityAnalysis {
  entity_id: string;
  state: string;
  friendly_name?: string;
  domain: string;
  attributes: Entity['attributes'];
  last_changed: string;
  references: EntityReferences;
  summary: string;
  history?: Array<{ state: string; last_changed: string }>;
}

const ANALYSIS_HISTORY_LIMIT = 20;

/** Scenes and groups list their members in the `entity_id` attribute. */
function listsMember(entity: Entity, entityId: string): boolean {
  const members = entity.attributes.entity_id;
  return Array.isArray(members) && members.includes(entityId);
}

export function entitySummary(analysis: Omit<EntityAnalysis, 'summary'>): string {
  const { references } = analysis;
  const parts = [`'${analysis.friendly_name || analysis.entity_id}' (${analysis.domain}) is currently ${analysis.state}.`];

  if (references.total_references === 0) {
    parts.push('This entity is not referenced by any automations, scenes, or groups.');
  } else {
    const counts: string[] = [];
    if (references.automations.length > 0) counts.push(`${references.automations.length} automation(s)`);
    if (references.scenes.length > 0) counts.push(`${references.scenes.length} scene(s)`);
    if (references.groups.length > 0) counts.push(`${references.groups.length} group(s)`);
    parts.push(`Referenced by ${counts.join(', ')}.`);
  }

  for (const automation of references.automations) {
    parts.push(`- Automation '${automation.alias || automation.entity_id}' uses it in: ${automation.used_in.join(', ')}`);
  }
  return parts.join(' ');
}

async function recentHistory(ctx: ToolContext, entityId: string): Promise<EntityAnalysis['history']> {
  const end = new Date();
  const start = new Date(end.getTime() - DEFAULT_HISTORY_HOURS * HOUR_MS);
  try {
    const history = await ctx.client.getHistory(entityId, start, end, ctx.signal);
    return (history[0] ?? [])
      .slice(0, ANALYSIS_HISTORY_LIMIT)
      .map((entry) => ({ state: entry.state, last_changed: entry.last_changed }));
  } catch (error) {
    ctx.logger.debug({ entityId, error: errorMessage(error) }, 'History unavailable for entity analysis');
    return undefined;
  }
}

async function analyzeEntity(ctx: ToolContext, args: ToolArgs): Promise<ToolResult> {
  const entityId = getString(args, 'entity_id');
  if (!entityId) {
    return errorResult('entity_id is required');
  }

  let entity: Entity;
  try {
    entity = await ctx.client.getState(entityId, ctx.signal);
  } catch (error) {
    return errorResult(`Error getting entity state: ${errorMessage(error)}`);
  }

  let states: Entity[];
  let automations: Automation[];
  try {
    states = await ctx.client.getStates(ctx.signal);
    automations = await ctx.client.listAutomations(ctx.signal);
  } catch (error) {
    return errorResult(`Error analyzing entity: ${errorMessage(error)}`);
  }

  const { usages, skipped } = await scanAutomationUsage(ctx, automations, entityId);
  const scenes = states
    .filter((state) => state.entity_id.startsWith('scene.') && listsMember(state, entityId))
    .map((scene) => ({ entity_id: scene.entity_id, friendly_name: getStringAttribute(scene.attributes, 'friendly_name') }));
  const groups = states
    .filter((state) => state.entity_id.startsWith('group.') && listsMember(state, entityId))
    .map((group) => group.entity_id);

  const references: EntityReferences = {
    automations: usages.map((usage) => ({
      entity_id: usage.automation.entity_id,
      alias: usage.alias,
      state: usage.automation.state,
      last_triggered: usage.automation.last_triggered,
      used_in: usage.usedIn
    })),
    scenes,
    groups,
    total_references: usages.length + scenes.length + groups.length,
    ...(skipped.length > 0 ? { skipped_automations: skipped } : {})
  };

  const analysis: Omit<EntityAnalysis, 'summary'> = {
    entity_id: entityId,
    state: entity.state,
    friendly_name: getStringAttribute(entity.attributes, 'friendly_name'),
    domain: entityDomain(entityId),
    attributes: entity.attributes,
    last_changed: entity.last_changed,
    references,
    history: getBoolean(args, 'include_history') ? await recentHistory(ctx, entityId) : undefined
  };

  return jsonResult({ ...analysis, summary: entitySummary(analysis) }, 'analysis');
}

export const entityTools: ToolDefinition[] = [
  {
    name: 'get_states',
    description:
      'List entity states. Filters combine with AND: domain, state, state_not, name_contains (entity id or friendly name, case-insensitive).',
    inputSchema: {
      domain: z.string().optional().describe('Entity domain, e.g. "light"'),
      state: z.string().optional(),
      state_not: z.string().optional(),
      name_contains: z.string().optional(),
      verbose: z.boolean().optional().describe('Include attributes and timestamps')
    },
    mutating: false,
    handler: getStates
  },
  {
    name: 'get_state',
    description: 'Get the full state of one entity.',
    inputSchema: {
      entity_id: z.string()
    },
    mutating: false,
    handler: getState
  },
  {
    name: 'get_history',
    description:
      'Get state history for an entity. Defaults to the last 24 hours; "hours" overrides start_time. Times are RFC 3339.',
    inputSchema: {
      entity_id: z.string(),
      start_time: z.string().optional().describe('RFC 3339 start, e.g. 2026-01-01T00:00:00Z'),
      end_time: z.string().optional().describe('RFC 3339 end; defaults to now'),
      hours: z.number().optional().describe('Look back this many hours from end_time'),
      state: z.string().optional().describe('Only entries with this state'),
      limit: z.number().optional().describe('Keep only the most recent N entries'),
      verbose: z.boolean().optional()
    },
    mutating: false,
    handler: getHistory
  },
  {
    name: 'list_domains',
    description: 'List entity domains with the number of entities in each.',
    inputSchema: {},
    mutating: false,
    handler: listDomains
  },
  {
    name: 'get_entity_dependencies',
    description: 'Find the automations that reference an entity and whether it is used in triggers, conditions or actions.',
    inputSchema: {
      entity_id: z.string()
    },
    mutating: false,
    handler: getEntityDependencies
  },
  {
    name: 'analyze_entity',
    description:
      'Analyze one entity: its state and attributes, the automations, scenes and groups that reference it, and optionally its last 24 hours of history.',
    inputSchema: {
      entity_id: z.string(),
      include_history: z.boolean().optional().describe('Include up to 20 state changes from the last 24 hours')
    },
    mutating: false,
    handler: analyzeEntity
  }
];
