import { HELPER_PLATFORMS, type HelperPlatform } from './types.js';

const AUTOMATION_PREFIX = 'automation.';

export function toAutomationEntityId(automationId: string): string {
  return automationId.startsWith(AUTOMATION_PREFIX) ? automationId : `${AUTOMATION_PREFIX}${automationId}`;
}

export function stripAutomationPrefix(automationId: string): string {
  return automationId.startsWith(AUTOMATION_PREFIX) ? automationId.slice(AUTOMATION_PREFIX.length) : automationId;
}

/** "light.kitchen" -> "light"; ids without a domain yield "". */
export function entityDomain(entityId: string): string {
  const dot = entityId.indexOf('.');
  return dot > 0 ? entityId.slice(0, dot) : '';
}

export function isHelperPlatform(value: string): value is HelperPlatform {
  return HELPER_PLATFORMS.some((platform) => platform === value);
}

/** Splits "input_number.volume" into its platform and object id. */
export function parseHelperEntityId(entityId: string): { platform: HelperPlatform; id: string } | undefined {
  const dot = entityId.indexOf('.');
  if (dot <= 0 || dot === entityId.length - 1) {
    return undefined;
  }
  const platform = entityId.slice(0, dot);
  if (!isHelperPlatform(platform)) {
    return undefined;
  }
  return { platform, id: entityId.slice(dot + 1) };
}
