import type { Logger } from 'pino';

import { ensureError, HaMcpError, type ErrorCode } from '../errors.js';
import {
  isRecord,
  normalizeEntities,
  normalizeEntity,
  normalizeHistory,
  normalizeSceneConfig,
  toStringValue
} from './normalizer.js';
import type {
  ApiStatus,
  AutomationConfig,
  ConfigMapping,
  Entity,
  HistoryEntry,
  SceneConfig
} from './types.js';

export interface RestClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  readRetries: number;
  readRetryBackoffMs: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface RequestOptions {
  method?: HttpMethod;
  body?: unknown;
  query?: Record<string, string | undefined>;
  signal?: AbortSignal;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusToErrorCode(status: number): ErrorCode {
  if (status === 401 || status === 403) {
    return 'AUTH';
  }
  if (status === 404) {
    return 'NOT_FOUND';
  }
  if (status === 400 || status === 405) {
    return 'BAD_REQUEST';
  }
  return 'HA_ERROR';
}

function errorBodyMessage(rawText: string): string {
  const trimmed = rawText.trim();
  if (!trimmed.startsWith('{')) {
    return trimmed;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (isRecord(parsed) && typeof parsed.message === 'string') {
      return parsed.message;
    }
  } catch {
    return trimmed;
  }
  return trimmed;
}

/**
 * Thin client over the Home Assistant REST API. Reads are retried with a
 * linear back-off; writes are sent exactly once.
 */
export class RestClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: RestClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private buildUrl(path: string, query: Record<string, string | undefined> = {}): URL {
    const url = new URL(`${this.options.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === '') {
        continue;
      }
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async executeFetch(
    url: URL,
    init: RequestInit,
    options: { idempotent: boolean; signal?: AbortSignal }
  ): Promise<Response> {
    const retries = options.idempotent ? this.options.readRetries : 0;
    const external = options.signal;

    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt += 1) {
      if (external?.aborted) {
        throw new HaMcpError('TIMEOUT', `Request aborted for ${url.pathname}`, { cause: external.reason });
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
      const onAbort = () => controller.abort();
      external?.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await this.fetchImpl(url, {
          ...init,
          signal: controller.signal
        });

        if (options.idempotent && response.status >= 500 && attempt < retries) {
          this.options.logger.warn(
            { path: url.pathname, status: response.status, attempt },
            'Home Assistant returned a server error; retrying'
          );
          await wait(this.options.readRetryBackoffMs * (attempt + 1));
          continue;
        }

        return response;
      } catch (error) {
        lastError = error;
        if (attempt >= retries || external?.aborted) {
          break;
        }
        await wait(this.options.readRetryBackoffMs * (attempt + 1));
      } finally {
        clearTimeout(timeout);
        external?.removeEventListener('abort', onAbort);
      }
    }

    const err = ensureError(lastError);
    if (err.name === 'AbortError') {
      throw new HaMcpError('TIMEOUT', `Request timed out for ${url.pathname}`, { cause: err });
    }
    throw new HaMcpError('NETWORK', `Network failure for ${url.pathname}: ${err.message}`, { cause: err });
  }

  private async parseResponse(response: Response): Promise<unknown> {
    const rawText = await response.text();

    if (!response.ok) {
      throw new HaMcpError(
        statusToErrorCode(response.status),
        `HTTP ${response.status} ${response.statusText}: ${errorBodyMessage(rawText)}`,
        { statusCode: response.status }
      );
    }

    const trimmed = rawText.trim();
    if (!trimmed) {
      return null;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json') || trimmed.startsWith('{') || trimmed.startsWith('[')) {
      try {
        return JSON.parse(trimmed);
      } catch {
        return rawText;
      }
    }

    return rawText;
  }

  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const url = this.buildUrl(path, options.query);

    this.options.logger.debug({ method, path: url.pathname }, 'Home Assistant REST request');

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.token}`,
      Accept: 'application/json'
    };
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const response = await this.executeFetch(url, init, {
      idempotent: method === 'GET',
      signal: options.signal
    });
    return this.parseResponse(response);
  }

  async getApiStatus(signal?: AbortSignal): Promise<ApiStatus> {
    const payload = await this.request('/api/', { signal });
    const message = isRecord(payload) ? toStringValue(payload.message) : toStringValue(payload);
    return { message };
  }

  async getStates(signal?: AbortSignal): Promise<Entity[]> {
    const payload = await this.request('/api/states', { signal });
    if (!Array.isArray(payload)) {
      throw new HaMcpError('HA_ERROR', 'Unexpected response for /api/states: expected a list');
    }
    return normalizeEntities(payload);
  }

  async getState(entityId: string, signal?: AbortSignal): Promise<Entity> {
    try {
      const payload = await this.request(`/api/states/${encodeURIComponent(entityId)}`, { signal });
      const entity = normalizeEntity(payload);
      if (!entity) {
        throw new HaMcpError('HA_ERROR', `Unexpected response for entity ${entityId}`);
      }
      return entity;
    } catch (error) {
      if (error instanceof HaMcpError && error.code === 'NOT_FOUND') {
        throw new HaMcpError('NOT_FOUND', `entity not found: ${entityId}`, { cause: error, statusCode: 404 });
      }
      throw error;
    }
  }

  async getHistory(entityId: string, start: Date, end: Date, signal?: AbortSignal): Promise<HistoryEntry[][]> {
    const payload = await this.request(`/api/history/period/${encodeURIComponent(start.toISOString())}`, {
      query: {
        filter_entity_id: entityId,
        end_time: end.toISOString()
      },
      signal
    });
    return normalizeHistory(payload, entityId);
  }

  async callService(domain: string, service: string, data: ConfigMapping, signal?: AbortSignal): Promise<Entity[]> {
    const payload = await this.request(
      `/api/services/${encodeURIComponent(domain)}/${encodeURIComponent(service)}`,
      { method: 'POST', body: data, signal }
    );
    // Newer releases wrap the changed states when a service response is requested.
    if (isRecord(payload) && Array.isArray(payload.changed_states)) {
      return normalizeEntities(payload.changed_states);
    }
    return normalizeEntities(payload);
  }

  async saveAutomationConfig(configId: string, config: AutomationConfig, signal?: AbortSignal): Promise<void> {
    await this.request(`/api/config/automation/config/${encodeURIComponent(configId)}`, {
      method: 'POST',
      body: { ...config, id: configId },
      signal
    });
  }

  async deleteAutomationConfig(configId: string, signal?: AbortSignal): Promise<void> {
    await this.request(`/api/config/automation/config/${encodeURIComponent(configId)}`, {
      method: 'DELETE',
      signal
    });
  }

  async getSceneConfig(sceneId: string, signal?: AbortSignal): Promise<SceneConfig> {
    const payload = await this.request(`/api/config/scene/config/${encodeURIComponent(sceneId)}`, { signal });
    return normalizeSceneConfig(payload);
  }

  async saveSceneConfig(sceneId: string, config: SceneConfig, signal?: AbortSignal): Promise<void> {
    // The scene editor stores attributes inline next to the state.
    const entities: Record<string, ConfigMapping> = {};
    for (const [entityId, desired] of Object.entries(config.entities)) {
      entities[entityId] = {
        ...(desired.attributes ?? {}),
        ...(desired.state !== undefined ? { state: desired.state } : {})
      };
    }

    await this.request(`/api/config/scene/config/${encodeURIComponent(sceneId)}`, {
      method: 'POST',
      body: {
        id: sceneId,
        name: config.name,
        ...(config.icon ? { icon: config.icon } : {}),
        entities,
        ...(config.metadata ? { metadata: config.metadata } : {})
      },
      signal
    });
  }

  async deleteSceneConfig(sceneId: string, signal?: AbortSignal): Promise<void> {
    await this.request(`/api/config/scene/config/${encodeURIComponent(sceneId)}`, {
      method: 'DELETE',
      signal
    });
  }
}
