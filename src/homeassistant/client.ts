import type { Logger } from 'pino';

import { HaMcpError } from '../errors.js';
import { parseHelperEntityId, stripAutomationPrefix, toAutomationEntityId } from './entityId.js';
import {
  getStringAttribute,
  isRecord,
  normalizeAutomationConfig,
  normalizeExtractFromTarget,
  toConfigMapping,
  toOptionalString,
  toStringList
} from './normalizer.js';
import type { RestClient } from './restClient.js';
import type {
  ApiStatus,
  Automation,
  AutomationConfig,
  ConfigMapping,
  ConfigValue,
  Entity,
  ExtractFromTargetResult,
  HelperConfig,
  HistoryEntry,
  SceneConfig,
  Target
} from './types.js';
import type { WsConnection } from './wsConnection.js';

/**
 * Everything the tool handlers need from Home Assistant. Handlers depend on
 * this interface only, so tests can substitute a fake.
 */
export interface HomeAssistantClient {
  ping(signal?: AbortSignal): Promise<ApiStatus>;

  getStates(signal?: AbortSignal): Promise<Entity[]>;
  getState(entityId: string, signal?: AbortSignal): Promise<Entity>;
  getHistory(entityId: string, start: Date, end: Date, signal?: AbortSignal): Promise<HistoryEntry[][]>;
  callService(domain: string, service: string, data: ConfigMapping, signal?: AbortSignal): Promise<Entity[]>;

  listAutomations(signal?: AbortSignal): Promise<Automation[]>;
  getAutomation(automationId: string, signal?: AbortSignal): Promise<Automation>;
  createAutomation(config: AutomationConfig, signal?: AbortSignal): Promise<void>;
  updateAutomation(automationId: string, config: AutomationConfig, signal?: AbortSignal): Promise<void>;
  deleteAutomation(automationId: string, signal?: AbortSignal): Promise<void>;
  toggleAutomation(entityId: string, enabled: boolean, signal?: AbortSignal): Promise<void>;

  listHelpers(signal?: AbortSignal): Promise<Entity[]>;
  createHelper(config: HelperConfig, signal?: AbortSignal): Promise<void>;
  updateHelper(helperId: string, config: HelperConfig, signal?: AbortSignal): Promise<void>;
  deleteHelper(entityId: string, signal?: AbortSignal): Promise<void>;
  setHelperValue(entityId: string, value: ConfigValue, signal?: AbortSignal): Promise<void>;

  listScenes(signal?: AbortSignal): Promise<Entity[]>;
  getSceneConfig(sceneId: string, signal?: AbortSignal): Promise<SceneConfig>;
  createScene(sceneId: string, config: SceneConfig, signal?: AbortSignal): Promise<void>;
  updateScene(sceneId: string, config: SceneConfig, signal?: AbortSignal): Promise<void>;
  deleteScene(sceneId: string, signal?: AbortSignal): Promise<void>;

  getScheduleConfig(entityId: string, signal?: AbortSignal): Promise<ConfigMapping>;

  getTriggersForTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<string[]>;
  getConditionsForTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<string[]>;
  getServicesForTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<string[]>;
  extractFromTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<ExtractFromTargetResult>;
}

export interface HybridClientOptions {
  rest: RestClient;
  ws: WsConnection;
  logger: Logger;
}

function helperCommandParams(config: HelperConfig, includeId: boolean): Record<string, unknown> {
  return {
    ...(includeId && config.id ? { [`${config.platform}_id`]: config.id } : {}),
    ...config.config
  };
}

function targetParams(target: Target, expandGroup: boolean | undefined): Record<string, unknown> {
  const cleaned: Target = {};
  if (target.entity_id?.length) cleaned.entity_id = target.entity_id;
  if (target.device_id?.length) cleaned.device_id = target.device_id;
  if (target.area_id?.length) cleaned.area_id = target.area_id;
  if (target.label_id?.length) cleaned.label_id = target.label_id;
  return {
    target: cleaned,
    ...(expandGroup !== undefined ? { expand_group: expandGroup } : {})
  };
}

/**
 * Routes each capability to the transport that supports it: entity state,
 * history, services and stored automation/scene configs go over REST; config
 * reads, helper storage, schedules and target introspection over WebSocket.
 */
export class HybridHomeAssistantClient implements HomeAssistantClient {
  private readonly rest: RestClient;
  private readonly ws: WsConnection;
  private readonly logger: Logger;

  constructor(options: HybridClientOptions) {
    this.rest = options.rest;
    this.ws = options.ws;
    this.logger = options.logger;
  }

  close(): void {
    this.ws.close();
  }

  /** Both transports must answer: the REST status endpoint and a WebSocket ping. */
  async ping(signal?: AbortSignal): Promise<ApiStatus> {
    const status = await this.rest.getApiStatus(signal);
    await this.ws.ping(signal);
    return status;
  }

  getStates(signal?: AbortSignal): Promise<Entity[]> {
    return this.rest.getStates(signal);
  }

  getState(entityId: string, signal?: AbortSignal): Promise<Entity> {
    return this.rest.getState(entityId, signal);
  }

  getHistory(entityId: string, start: Date, end: Date, signal?: AbortSignal): Promise<HistoryEntry[][]> {
    return this.rest.getHistory(entityId, start, end, signal);
  }

  callService(domain: string, service: string, data: ConfigMapping, signal?: AbortSignal): Promise<Entity[]> {
    this.logger.info({ domain, service }, 'Calling Home Assistant service');
    return this.rest.callService(domain, service, data, signal);
  }

  async listAutomations(signal?: AbortSignal): Promise<Automation[]> {
    const states = await this.rest.getStates(signal);
    return states
      .filter((entity) => entity.entity_id.startsWith('automation.'))
      .map((entity) => ({
        entity_id: entity.entity_id,
        state: entity.state,
        friendly_name: getStringAttribute(entity.attributes, 'friendly_name'),
        last_triggered: getStringAttribute(entity.attributes, 'last_triggered')
      }));
  }

  async getAutomation(automationId: string, signal?: AbortSignal): Promise<Automation> {
    const entityId = toAutomationEntityId(automationId);
    const result = await this.ws.sendCommand('automation/config', { entity_id: entityId }, signal);
    if (!isRecord(result) || !isRecord(result.config)) {
      throw new HaMcpError('HA_ERROR', `automation/config returned no configuration for ${entityId}`);
    }
    return {
      entity_id: entityId,
      config: normalizeAutomationConfig(result.config)
    };
  }

  async createAutomation(config: AutomationConfig, signal?: AbortSignal): Promise<void> {
    if (!config.id) {
      throw new HaMcpError('BAD_REQUEST', 'automation config requires an id');
    }
    await this.rest.saveAutomationConfig(config.id, config, signal);
  }

  async updateAutomation(automationId: string, config: AutomationConfig, signal?: AbortSignal): Promise<void> {
    await this.rest.saveAutomationConfig(stripAutomationPrefix(automationId), config, signal);
  }

  async deleteAutomation(automationId: string, signal?: AbortSignal): Promise<void> {
    await this.rest.deleteAutomationConfig(stripAutomationPrefix(automationId), signal);
  }

  async toggleAutomation(entityId: string, enabled: boolean, signal?: AbortSignal): Promise<void> {
    await this.callService('automation', enabled ? 'turn_on' : 'turn_off', { entity_id: toAutomationEntityId(entityId) }, signal);
  }

  async listHelpers(signal?: AbortSignal): Promise<Entity[]> {
    const states = await this.rest.getStates(signal);
    return states.filter((entity) => parseHelperEntityId(entity.entity_id) !== undefined);
  }

  async createHelper(config: HelperConfig, signal?: AbortSignal): Promise<void> {
    await this.ws.sendCommand(`${config.platform}/create`, helperCommandParams(config, true), signal);
  }

  async updateHelper(helperId: string, config: HelperConfig, signal?: AbortSignal): Promise<void> {
    await this.ws.sendCommand(
      `${config.platform}/update`,
      { ...helperCommandParams(config, false), [`${config.platform}_id`]: helperId },
      signal
    );
  }

  async deleteHelper(entityId: string, signal?: AbortSignal): Promise<void> {
    const helper = parseHelperEntityId(entityId);
    if (!helper) {
      throw new HaMcpError('BAD_REQUEST', `unable to determine platform for helper ${entityId}`);
    }
    await this.ws.sendCommand(`${helper.platform}/delete`, { [`${helper.platform}_id`]: helper.id }, signal);
  }

  async setHelperValue(entityId: string, value: ConfigValue, signal?: AbortSignal): Promise<void> {
    const platform = parseHelperEntityId(entityId)?.platform;
    if (!platform) {
      throw new HaMcpError('BAD_REQUEST', `unable to determine platform for helper ${entityId}`);
    }

    switch (platform) {
      case 'input_boolean':
        if (typeof value !== 'boolean') {
          throw new HaMcpError('BAD_REQUEST', 'input_boolean requires a boolean value');
        }
        await this.callService(platform, value ? 'turn_on' : 'turn_off', { entity_id: entityId }, signal);
        return;
      case 'input_number':
      case 'input_text':
      case 'counter':
        await this.callService(platform, 'set_value', { entity_id: entityId, value }, signal);
        return;
      case 'input_select':
        await this.callService(platform, 'select_option', { entity_id: entityId, option: value }, signal);
        return;
      case 'input_datetime': {
        const data: ConfigMapping = isRecord(value) ? toConfigMapping(value) : { datetime: value };
        await this.callService(platform, 'set_datetime', { ...data, entity_id: entityId }, signal);
        return;
      }
      case 'input_button':
      case 'timer':
      case 'schedule':
        throw new HaMcpError('BAD_REQUEST', `unsupported helper platform: ${platform}`);
    }
  }

  async listScenes(signal?: AbortSignal): Promise<Entity[]> {
    const states = await this.rest.getStates(signal);
    return states.filter((entity) => entity.entity_id.startsWith('scene.'));
  }

  getSceneConfig(sceneId: string, signal?: AbortSignal): Promise<SceneConfig> {
    return this.rest.getSceneConfig(sceneId, signal);
  }

  createScene(sceneId: string, config: SceneConfig, signal?: AbortSignal): Promise<void> {
    return this.rest.saveSceneConfig(sceneId, config, signal);
  }

  updateScene(sceneId: string, config: SceneConfig, signal?: AbortSignal): Promise<void> {
    return this.rest.saveSceneConfig(sceneId, config, signal);
  }

  deleteScene(sceneId: string, signal?: AbortSignal): Promise<void> {
    return this.rest.deleteSceneConfig(sceneId, signal);
  }

  async getScheduleConfig(entityId: string, signal?: AbortSignal): Promise<ConfigMapping> {
    const objectId = entityId.startsWith('schedule.') ? entityId.slice('schedule.'.length) : entityId;
    const result = await this.ws.sendCommand('schedule/list', {}, signal);
    const items = Array.isArray(result) ? result.filter(isRecord) : [];
    const match = items.find((item) => toOptionalString(item.id) === objectId);
    if (!match) {
      throw new HaMcpError('NOT_FOUND', `schedule configuration not found: ${entityId}`);
    }
    return toConfigMapping(match);
  }

  getTriggersForTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<string[]> {
    return this.identifiersForTarget('get_triggers_for_target', target, expandGroup, signal);
  }

  getConditionsForTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<string[]> {
    return this.identifiersForTarget('get_conditions_for_target', target, expandGroup, signal);
  }

  getServicesForTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<string[]> {
    return this.identifiersForTarget('get_services_for_target', target, expandGroup, signal);
  }

  async extractFromTarget(target: Target, expandGroup?: boolean, signal?: AbortSignal): Promise<ExtractFromTargetResult> {
    const result = await this.ws.sendCommand('extract_from_target', targetParams(target, expandGroup), signal);
    return normalizeExtractFromTarget(result);
  }

  private async identifiersForTarget(
    command: string,
    target: Target,
    expandGroup: boolean | undefined,
    signal?: AbortSignal
  ): Promise<string[]> {
    const result = await this.ws.sendCommand(command, targetParams(target, expandGroup), signal);
    if (!Array.isArray(result)) {
      throw new HaMcpError('HA_ERROR', `${command} returned an unexpected payload`);
    }
    return toStringList(result);
  }
}
