import type {
  AutomationConfig,
  ConfigMapping,
  ConfigValue,
  Entity,
  EntityContext,
  ExtractFromTargetResult,
  HistoryEntry,
  SceneConfig,
  SceneEntityState
} from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toStringValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

export function toOptionalString(value: unknown): string | undefined {
  const text = toStringValue(value);
  return text ? text : undefined;
}

/**
 * Narrows an arbitrary decoded JSON value to a ConfigValue. Values JSON cannot
 * carry (undefined, functions, non-finite numbers) become null; undefined
 * mapping entries are dropped.
 */
export function toConfigValue(value: unknown): ConfigValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toConfigValue(item));
  }
  if (isRecord(value)) {
    return toConfigMapping(value);
  }
  return null;
}

export function toConfigMapping(value: unknown): ConfigMapping {
  const result: ConfigMapping = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, nested] of Object.entries(value)) {
    if (nested === undefined) {
      continue;
    }
    result[key] = toConfigValue(nested);
  }
  return result;
}

export function toConfigArray(value: unknown): ConfigValue[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.map((item) => toConfigValue(item));
}

export function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function getStringAttribute(attributes: ConfigMapping, key: string): string | undefined {
  const value = attributes[key];
  return typeof value === 'string' && value ? value : undefined;
}

function normalizeContext(raw: unknown): EntityContext | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const id = toOptionalString(raw.id);
  if (!id) {
    return undefined;
  }
  const parentId = toOptionalString(raw.parent_id);
  const userId = toOptionalString(raw.user_id);
  return {
    id,
    ...(parentId ? { parent_id: parentId } : {}),
    ...(userId ? { user_id: userId } : {})
  };
}

export function normalizeEntity(raw: unknown): Entity | null {
  if (!isRecord(raw)) {
    return null;
  }

  const entityId = toOptionalString(raw.entity_id);
  if (!entityId) {
    return null;
  }

  const context = normalizeContext(raw.context);
  return {
    entity_id: entityId,
    state: toStringValue(raw.state),
    attributes: toConfigMapping(raw.attributes),
    last_changed: toStringValue(raw.last_changed),
    last_updated: toStringValue(raw.last_updated),
    ...(context ? { context } : {})
  };
}

export function normalizeEntities(raw: unknown): Entity[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const result: Entity[] = [];
  for (const item of raw) {
    const entity = normalizeEntity(item);
    if (entity) {
      result.push(entity);
    }
  }
  return result;
}

/**
 * History comes back as one list per requested entity. Entries after the first
 * may omit entity_id, so the requested id fills the gap.
 */
export function normalizeHistory(raw: unknown, entityId: string): HistoryEntry[][] {
  if (!Array.isArray(raw)) {
    return [];
  }

  return raw
    .filter((series): series is unknown[] => Array.isArray(series))
    .map((series) =>
      series.filter(isRecord).map((entry) => ({
        entity_id: toOptionalString(entry.entity_id) ?? entityId,
        state: toStringValue(entry.state),
        attributes: toConfigMapping(entry.attributes),
        last_changed: toStringValue(entry.last_changed),
        last_updated: toStringValue(entry.last_updated ?? entry.last_changed)
      }))
    );
}

function firstArray(record: Record<string, unknown>, keys: string[]): ConfigValue[] | undefined {
  for (const key of keys) {
    const candidate = toConfigArray(record[key]);
    if (candidate) {
      return candidate;
    }
  }
  return undefined;
}

/** Accepts both the current plural keys and the legacy singular ones. */
export function normalizeAutomationConfig(raw: unknown): AutomationConfig {
  if (!isRecord(raw)) {
    return {};
  }

  const config: AutomationConfig = {};
  const id = toOptionalString(raw.id);
  const alias = toOptionalString(raw.alias);
  const description = toOptionalString(raw.description);
  const mode = toOptionalString(raw.mode);
  const triggers = firstArray(raw, ['triggers', 'trigger']);
  const conditions = firstArray(raw, ['conditions', 'condition']);
  const actions = firstArray(raw, ['actions', 'action']);

  if (id) config.id = id;
  if (alias) config.alias = alias;
  if (description) config.description = description;
  if (mode) config.mode = mode;
  if (triggers) config.triggers = triggers;
  if (conditions) config.conditions = conditions;
  if (actions) config.actions = actions;
  if (isRecord(raw.variables)) {
    config.variables = toConfigMapping(raw.variables);
  }

  return config;
}

export function normalizeSceneEntityState(raw: unknown): SceneEntityState | null {
  if (typeof raw === 'string') {
    return { state: raw };
  }
  if (!isRecord(raw)) {
    return null;
  }

  const result: SceneEntityState = {};
  const state = toOptionalString(raw.state);
  if (state) {
    result.state = state;
  }
  if (isRecord(raw.attributes)) {
    result.attributes = toConfigMapping(raw.attributes);
  } else {
    // Stored scene configs keep attributes inline next to state.
    const inline = toConfigMapping(raw);
    delete inline.state;
    if (Object.keys(inline).length) {
      result.attributes = inline;
    }
  }
  return result;
}

export function normalizeSceneConfig(raw: unknown): SceneConfig {
  if (!isRecord(raw)) {
    return { name: '', entities: {} };
  }

  const entities: Record<string, SceneEntityState> = {};
  if (isRecord(raw.entities)) {
    for (const [entityId, value] of Object.entries(raw.entities)) {
      const state = normalizeSceneEntityState(value);
      if (state) {
        entities[entityId] = state;
      }
    }
  }

  const id = toOptionalString(raw.id);
  const icon = toOptionalString(raw.icon);
  return {
    ...(id ? { id } : {}),
    name: toStringValue(raw.name),
    ...(icon ? { icon } : {}),
    entities,
    ...(isRecord(raw.metadata) ? { metadata: toConfigMapping(raw.metadata) } : {})
  };
}

export function normalizeExtractFromTarget(raw: unknown): ExtractFromTargetResult {
  const record = isRecord(raw) ? raw : {};
  return {
    referenced_entities: toStringList(record.referenced_entities),
    referenced_devices: toStringList(record.referenced_devices),
    referenced_areas: toStringList(record.referenced_areas),
    missing_devices: toStringList(record.missing_devices),
    missing_areas: toStringList(record.missing_areas),
    missing_floors: toStringList(record.missing_floors),
    missing_labels: toStringList(record.missing_labels)
  };
}
