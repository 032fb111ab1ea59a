import { isHelperPlatform } from '../homeassistant/entityId.js';
import { toConfigValue } from '../homeassistant/normalizer.js';
import type { ConfigMapping, HelperPlatform } from '../homeassistant/types.js';
import { getArray, getBoolean, getNumber, getString, getStringArray, type ToolArgs } from './args.js';

export const SCHEDULE_DAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export type ScheduleDay = (typeof SCHEDULE_DAYS)[number];

function copyString(target: ConfigMapping, args: ToolArgs, key: string): void {
  const value = getString(args, key);
  if (value) {
    target[key] = value;
  }
}

function copyNumber(target: ConfigMapping, args: ToolArgs, key: string): void {
  const value = getNumber(args, key);
  if (value !== undefined) {
    target[key] = value;
  }
}

function copyBoolean(target: ConfigMapping, args: ToolArgs, key: string): void {
  const value = getBoolean(args, key);
  if (value !== undefined) {
    target[key] = value;
  }
}

function copyScheduleDays(target: ConfigMapping, args: ToolArgs): void {
  for (const day of SCHEDULE_DAYS) {
    const blocks = getArray(args, day);
    if (blocks && blocks.length > 0) {
      target[day] = blocks.map((block) => toConfigValue(block));
    }
  }
}

/**
 * Builds the storage payload for a helper. Only fields present with the
 * expected type are copied; values are not range-checked. Returns undefined
 * for a platform this server does not know, which is distinct from a config
 * that carries nothing but a name.
 */
export function buildHelperConfig(platform: HelperPlatform, name: string, args: ToolArgs): ConfigMapping;
export function buildHelperConfig(platform: string, name: string, args: ToolArgs): ConfigMapping | undefined;
export function buildHelperConfig(platform: string, name: string, args: ToolArgs): ConfigMapping | undefined {
  if (!isHelperPlatform(platform)) {
    return undefined;
  }

  const config: ConfigMapping = { name };
  copyString(config, args, 'icon');

  switch (platform) {
    case 'input_boolean':
      copyBoolean(config, args, 'initial');
      break;
    case 'input_number':
      copyNumber(config, args, 'min');
      copyNumber(config, args, 'max');
      copyNumber(config, args, 'step');
      copyNumber(config, args, 'initial');
      copyString(config, args, 'mode');
      copyString(config, args, 'unit_of_measurement');
      break;
    case 'input_text':
      copyNumber(config, args, 'min');
      copyNumber(config, args, 'max');
      copyString(config, args, 'initial');
      copyString(config, args, 'mode');
      copyString(config, args, 'pattern');
      break;
    case 'input_select': {
      const options = getStringArray(args, 'options');
      if (options && options.length > 0) {
        config.options = options;
      }
      copyString(config, args, 'initial');
      break;
    }
    case 'input_datetime':
      copyBoolean(config, args, 'has_date');
      copyBoolean(config, args, 'has_time');
      copyString(config, args, 'initial');
      break;
    case 'input_button':
      break;
    case 'counter':
      copyNumber(config, args, 'initial');
      copyNumber(config, args, 'minimum');
      copyNumber(config, args, 'maximum');
      copyNumber(config, args, 'step');
      copyBoolean(config, args, 'restore');
      break;
    case 'timer':
      copyString(config, args, 'duration');
      copyBoolean(config, args, 'restore');
      break;
    case 'schedule':
      copyScheduleDays(config, args);
      break;
  }

  return config;
}
