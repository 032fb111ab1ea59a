/**
 * Schema-less configuration tree, as found in automation triggers, conditions
 * and actions, entity attributes and service data.
 */
export type ConfigValue = null | string | number | boolean | ConfigValue[] | ConfigMapping;

export interface ConfigMapping {
  [key: string]: ConfigValue;
}

export interface EntityContext {
  id: string;
  parent_id?: string;
  user_id?: string;
}

export interface Entity {
  entity_id: string;
  state: string;
  attributes: ConfigMapping;
  last_changed: string;
  last_updated: string;
  context?: EntityContext;
}

export interface HistoryEntry {
  entity_id: string;
  state: string;
  attributes: ConfigMapping;
  last_changed: string;
  last_updated: string;
}

export const AUTOMATION_MODES = ['single', 'restart', 'queued', 'parallel'] as const;

export interface AutomationConfig {
  id?: string;
  alias?: string;
  description?: string;
  mode?: string;
  triggers?: ConfigValue[];
  conditions?: ConfigValue[];
  actions?: ConfigValue[];
  variables?: ConfigMapping;
}

export interface Automation {
  entity_id: string;
  state?: string;
  friendly_name?: string;
  last_triggered?: string;
  config?: AutomationConfig;
}

export const HELPER_PLATFORMS = [
  'input_boolean',
  'input_number',
  'input_text',
  'input_select',
  'input_datetime',
  'input_button',
  'counter',
  'timer',
  'schedule'
] as const;

export type HelperPlatform = (typeof HELPER_PLATFORMS)[number];

export interface HelperConfig {
  platform: HelperPlatform;
  id: string;
  config: ConfigMapping;
}

export interface SceneEntityState {
  state?: string;
  attributes?: ConfigMapping;
}

export interface SceneConfig {
  id?: string;
  name: string;
  icon?: string;
  entities: Record<string, SceneEntityState>;
  /** Scene editor bookkeeping, keyed by entity id; written back untouched. */
  metadata?: ConfigMapping;
}

export interface Target {
  entity_id?: string[];
  device_id?: string[];
  area_id?: string[];
  label_id?: string[];
}

export interface ExtractFromTargetResult {
  referenced_entities: string[];
  referenced_devices: string[];
  referenced_areas: string[];
  missing_devices: string[];
  missing_areas: string[];
  missing_floors: string[];
  missing_labels: string[];
}

export interface DomainCount {
  domain: string;
  entity_count: number;
}

export interface ApiStatus {
  message: string;
}
