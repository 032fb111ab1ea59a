import { describe, expect, test, vi } from 'vitest';

import type { ToolDefinition } from '../../src/tools/registry.js';
import { parseSceneEntities, sceneTools } from '../../src/tools/scenes.js';
import { serviceTools } from '../../src/tools/services.js';
import { parseTarget, targetTools } from '../../src/tools/targets.js';
import { makeContext, makeEntity, makeFakeClient, resultJson, resultText } from '../helpers/fakes.js';

function tool(name: string): ToolDefinition {
  const found = [...sceneTools, ...targetTools, ...serviceTools].find((candidate) => candidate.name === name);
  if (!found) {
    throw new Error(`missing tool ${name}`);
  }
  return found;
}

const scenes = [
  makeEntity('scene.movie_night', 'scening', { friendly_name: 'Movie night', entity_id: ['light.sofa', 'media_player.tv'] }),
  makeEntity('scene.morning', 'scening', { friendly_name: 'Morning', entity_id: ['light.kitchen'] })
];

describe('scene tools', () => {
  test('list_scenes filters by member entity', async () => {
    const client = makeFakeClient({ listScenes: vi.fn(async () => scenes) });
    const result = await tool('list_scenes').handler(makeContext(client), { entity_contains: 'MEDIA_PLAYER' });

    expect(resultText(result).split('\n')[0]).toBe('Found 1 scenes');
    expect(resultJson(result)).toEqual([
      {
        entity_id: 'scene.movie_night',
        state: 'scening',
        friendly_name: 'Movie night',
        entity_ids: ['light.sofa', 'media_player.tv']
      }
    ]);
  });

  test('parseSceneEntities accepts strings and state objects only', () => {
    expect(parseSceneEntities({ 'light.a': 'on', 'light.b': { state: 'on', attributes: { brightness: 100 } } })).toEqual({
      entities: { 'light.a': { state: 'on' }, 'light.b': { state: 'on', attributes: { brightness: 100 } } }
    });
    expect(parseSceneEntities({ 'light.a': 'on', 'light.c': 5 })).toEqual({ invalid: 'light.c' });
  });

  test('create_scene validates entities', async () => {
    const createScene = vi.fn(async () => undefined);
    const ctx = makeContext(makeFakeClient({ createScene }));

    expect(resultText(await tool('create_scene').handler(ctx, { scene_id: 'x', name: 'X', entities: {} }))).toBe(
      'entities is required and must be a non-empty object'
    );
    expect(resultText(await tool('create_scene').handler(ctx, { scene_id: 'x', name: 'X', entities: { 'light.a': [1] } }))).toBe(
      'Invalid state format for entity light.a'
    );

    const result = await tool('create_scene').handler(ctx, {
      scene_id: 'reading',
      name: 'Reading',
      entities: { 'light.desk': 'on' }
    });
    expect(resultText(result)).toBe("Scene 'reading' created successfully");
    expect(createScene).toHaveBeenCalledWith(
      'reading',
      { id: 'reading', name: 'Reading', entities: { 'light.desk': { state: 'on' } } },
      undefined
    );
  });

  test('update_scene keeps stored fields that were not given', async () => {
    const updateScene = vi.fn(async () => undefined);
    const client = makeFakeClient({
      getSceneConfig: vi.fn(async () => ({
        id: 'reading',
        name: 'Reading',
        icon: 'mdi:book',
        entities: { 'light.desk': { state: 'on' } }
      })),
      updateScene
    });

    const result = await tool('update_scene').handler(makeContext(client), { scene_id: 'reading', name: 'Reading time' });

    expect(resultText(result)).toBe("Scene 'reading' updated successfully");
    expect(updateScene).toHaveBeenCalledWith(
      'reading',
      { id: 'reading', name: 'Reading time', icon: 'mdi:book', entities: { 'light.desk': { state: 'on' } } },
      undefined
    );
  });

  test('activate_scene passes the transition', async () => {
    const callService = vi.fn(async () => []);
    const result = await tool('activate_scene').handler(makeContext(makeFakeClient({ callService })), {
      scene_id: 'movie_night',
      transition: 2
    });

    expect(resultText(result)).toBe("Scene 'movie_night' activated successfully");
    expect(callService).toHaveBeenCalledWith('scene', 'turn_on', { entity_id: 'scene.movie_night', transition: 2 }, undefined);
  });
});

describe('target tools', () => {
  test('parseTarget keeps non-empty lists', () => {
    expect(parseTarget({ entity_id: [], area_id: ['kitchen'], label_id: 'x' })).toEqual({ area_id: ['kitchen'] });
    expect(parseTarget({ entity_id: [] })).toBeUndefined();
  });

  test('a target is required', async () => {
    const result = await tool('get_services_for_target').handler(makeContext(makeFakeClient()), { expand_group: true });
    expect(result.isError).toBe(true);
    expect(resultText(result)).toBe(
      'Invalid parameters: at least one of entity_id, device_id, area_id, or label_id is required'
    );
  });

  test('forwards the target and expand_group', async () => {
    const getTriggersForTarget = vi.fn(async () => ['light.turned_on', 'light.turned_off']);
    const result = await tool('get_triggers_for_target').handler(makeContext(makeFakeClient({ getTriggersForTarget })), {
      entity_id: ['light.kitchen'],
      expand_group: false
    });

    expect(resultJson(result)).toEqual(['light.turned_on', 'light.turned_off']);
    expect(getTriggersForTarget).toHaveBeenCalledWith({ entity_id: ['light.kitchen'] }, false, undefined);
  });

  test('names the failing query', async () => {
    const client = makeFakeClient({
      extractFromTarget: vi.fn(async () => {
        throw new Error('extract_from_target failed: Unknown command.');
      })
    });
    const result = await tool('extract_from_target').handler(makeContext(client), { device_id: ['abc123'] });
    expect(resultText(result)).toBe('Error extracting from target: extract_from_target failed: Unknown command.');
  });
});

describe('call_service', () => {
  test('reports the changed entities', async () => {
    const callService = vi.fn(async () => [makeEntity('light.hall', 'on', { friendly_name: 'Hall', brightness: 255 })]);
    const result = await tool('call_service').handler(makeContext(makeFakeClient({ callService })), {
      domain: 'light',
      service: 'turn_on',
      data: { entity_id: 'light.hall', brightness: 255 }
    });

    expect(resultText(result).split('\n')[0]).toBe('Called light.turn_on; 1 entities changed');
    expect(resultJson(result)).toEqual([{ entity_id: 'light.hall', state: 'on', friendly_name: 'Hall' }]);
    expect(callService).toHaveBeenCalledWith('light', 'turn_on', { entity_id: 'light.hall', brightness: 255 }, undefined);
  });

  test('requires domain and service', async () => {
    const ctx = makeContext(makeFakeClient());
    expect(resultText(await tool('call_service').handler(ctx, { service: 'turn_on' }))).toBe('domain is required');
    expect(resultText(await tool('call_service').handler(ctx, { domain: 'light' }))).toBe('service is required');
  });
});
