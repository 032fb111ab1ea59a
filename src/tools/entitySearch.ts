import { isRecord } from '../homeassistant/normalizer.js';
import type { AutomationConfig, ConfigValue } from '../homeassistant/types.js';

export const MAX_SEARCH_DEPTH = 64;

export type UsageKind = 'trigger' | 'condition' | 'action';

function searchMapping(mapping: Record<string, unknown>, target: string, depth: number): boolean {
  for (const [key, value] of Object.entries(mapping)) {
    if (key === 'entity_id' && search(value, target, depth + 1)) {
      return true;
    }
    if ((key === 'target' || key === 'data') && isRecord(value) && search(value.entity_id, target, depth + 2)) {
      return true;
    }
    // Any other nesting (choose, sequence, if/then, parallel...) is walked too.
    if (search(value, target, depth + 1)) {
      return true;
    }
  }
  return false;
}

function search(value: unknown, target: string, depth: number): boolean {
  if (depth > MAX_SEARCH_DEPTH) {
    return false;
  }
  if (typeof value === 'string') {
    return value === target;
  }
  if (Array.isArray(value)) {
    return value.some((item) => search(item, target, depth + 1));
  }
  if (isRecord(value)) {
    return searchMapping(value, target, depth);
  }
  return false;
}

/**
 * True when the entity id appears as a string leaf anywhere in the tree.
 * Matching is exact; mapping keys are never compared against the id.
 */
export function searchEntityReference(value: ConfigValue, entityId: string): boolean {
  return search(value, entityId, 0);
}

export function findAutomationUsage(config: AutomationConfig, entityId: string): UsageKind[] {
  const usage: UsageKind[] = [];
  if (searchEntityReference(config.triggers ?? [], entityId)) {
    usage.push('trigger');
  }
  if (searchEntityReference(config.conditions ?? [], entityId)) {
    usage.push('condition');
  }
  if (searchEntityReference(config.actions ?? [], entityId)) {
    usage.push('action');
  }
  return usage;
}

export function automationReferencesEntity(config: AutomationConfig, entityId: string): boolean {
  return findAutomationUsage(config, entityId).length > 0;
}
