import { describe, expect, test, vi } from 'vitest';

import type { Automation, AutomationConfig } from '../../src/homeassistant/types.js';
import { automationTools } from '../../src/tools/automations.js';
import type { ToolDefinition } from '../../src/tools/registry.js';
import { makeContext, makeFakeClient, makeLogger, resultJson, resultText } from '../helpers/fakes.js';

function tool(name: string): ToolDefinition {
  const found = automationTools.find((candidate) => candidate.name === name);
  if (!found) {
    throw new Error(`missing tool ${name}`);
  }
  return found;
}

const automations: Automation[] = [
  { entity_id: 'automation.porch_lights', state: 'on', friendly_name: 'Porch lights', last_triggered: '2026-01-01T18:00:00+00:00' },
  { entity_id: 'automation.morning', state: 'off', friendly_name: 'Morning foo routine' },
  { entity_id: 'automation.foo_alarm', state: 'on', friendly_name: 'Foo alarm' }
];

const configs: Record<string, AutomationConfig> = {
  porch_lights: {
    id: '1001',
    alias: 'Porch lights',
    triggers: [{ trigger: 'sun', event: 'sunset' }],
    actions: [{ action: 'light.turn_on', target: { entity_id: 'light.porch' } }]
  },
  morning: {
    id: '1002',
    alias: 'Morning foo routine',
    triggers: [{ trigger: 'time', at: '07:00:00' }],
    actions: [{ action: 'light.turn_on', target: { entity_id: 'light.kitchen' } }]
  }
};

function automationClient() {
  return makeFakeClient({
    listAutomations: vi.fn(async () => automations),
    getAutomation: vi.fn(async (automationId: string) => {
      const config = configs[automationId];
      if (!config) {
        throw new Error(`no config for ${automationId}`);
      }
      return { entity_id: `automation.${automationId}`, config };
    })
  });
}

describe('list_automations', () => {
  test('combines state and alias filters', async () => {
    const ctx = makeContext(automationClient());
    const result = await tool('list_automations').handler(ctx, { state: 'on', alias: 'FOO' });

    expect(resultText(result).split('\n')[0]).toBe('Found 1 automations (use verbose=true for full details)');
    expect(resultJson(result)).toEqual([{ entity_id: 'automation.foo_alarm', state: 'on', alias: 'Foo alarm' }]);
  });

  test('filters by referenced entity and counts unreadable configs', async () => {
    const logger = makeLogger();
    const ctx = makeContext(automationClient(), logger);
    const result = await tool('list_automations').handler(ctx, { entity_id: 'light.porch' });

    expect(resultText(result).split('\n')[0]).toBe(
      'Found 1 automations (use verbose=true for full details); skipped 1 automations whose configuration could not be read'
    );
    expect(resultJson(result)).toEqual([
      {
        entity_id: 'automation.porch_lights',
        state: 'on',
        alias: 'Porch lights',
        last_triggered: '2026-01-01T18:00:00+00:00'
      }
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test('includes configs in verbose mode', async () => {
    const ctx = makeContext(automationClient());
    const result = await tool('list_automations').handler(ctx, { alias: 'morning', verbose: true });

    expect(resultJson(result)).toEqual([
      {
        entity_id: 'automation.morning',
        state: 'off',
        friendly_name: 'Morning foo routine',
        config: configs.morning
      }
    ]);
  });

  test('reports a listing failure', async () => {
    const client = makeFakeClient({
      listAutomations: vi.fn(async () => {
        throw new Error('HTTP 401 Unauthorized: invalid token');
      })
    });
    const result = await tool('list_automations').handler(makeContext(client), {});
    expect(result.isError).toBe(true);
    expect(resultText(result)).toBe('Error listing automations: HTTP 401 Unauthorized: invalid token');
  });
});

describe('get_automation', () => {
  test('falls back to a config id scan', async () => {
    const client = automationClient();
    const result = await tool('get_automation').handler(makeContext(client), { automation_id: '1002' });

    expect(resultJson(result)).toEqual({ entity_id: 'automation.morning', config: configs.morning });
  });

  test('explains every lookup that was tried', async () => {
    const result = await tool('get_automation').handler(makeContext(automationClient()), { automation_id: 'nope' });
    expect(resultText(result)).toBe(
      'Error getting automation: automation not found with ID: nope (tried as automation_id, entity_id, and config.id)'
    );
  });
});

describe('create_automation', () => {
  test('derives the id from the alias and uses plural keys', async () => {
    const createAutomation = vi.fn(async () => undefined);
    const client = makeFakeClient({ createAutomation });
    const result = await tool('create_automation').handler(makeContext(client), {
      alias: 'Turn On Living Room Lights',
      trigger: [{ trigger: 'state', entity_id: 'binary_sensor.motion', to: 'on' }],
      action: [{ action: 'light.turn_on', target: { entity_id: 'light.living_room' } }],
      mode: 'restart'
    });

    expect(resultText(result)).toBe(
      "Automation 'Turn On Living Room Lights' created successfully with ID 'turn_on_living_room_lights'"
    );
    expect(createAutomation).toHaveBeenCalledWith(
      {
        id: 'turn_on_living_room_lights',
        alias: 'Turn On Living Room Lights',
        mode: 'restart',
        triggers: [{ trigger: 'state', entity_id: 'binary_sensor.motion', to: 'on' }],
        actions: [{ action: 'light.turn_on', target: { entity_id: 'light.living_room' } }]
      },
      undefined
    );
  });

  test('validates required fields in order', async () => {
    const handler = tool('create_automation').handler;
    const ctx = makeContext(makeFakeClient());
    expect(resultText(await handler(ctx, {}))).toBe('alias is required');
    expect(resultText(await handler(ctx, { alias: 'X', trigger: [] }))).toBe('trigger is required');
    expect(resultText(await handler(ctx, { alias: 'X', trigger: [{ trigger: 'time' }] }))).toBe('action is required');
    expect(resultText(await handler(ctx, { alias: '!!!', trigger: [{}], action: [{}] }))).toBe(
      'alias must contain at least one letter or digit'
    );
  });
});

describe('update_automation', () => {
  test('merges provided fields over the stored config', async () => {
    const updateAutomation = vi.fn(async () => undefined);
    const client = makeFakeClient({
      getAutomation: vi.fn(async () => ({ entity_id: 'automation.porch_lights', config: configs.porch_lights })),
      updateAutomation
    });

    const result = await tool('update_automation').handler(makeContext(client), {
      automation_id: 'automation.porch_lights',
      description: '',
      condition: [],
      mode: 'queued'
    });

    expect(resultText(result)).toBe("Automation 'automation.porch_lights' updated successfully");
    expect(updateAutomation).toHaveBeenCalledWith(
      '1001',
      {
        ...configs.porch_lights,
        description: '',
        conditions: [],
        mode: 'queued'
      },
      undefined
    );
  });

  test('reports a failed lookup', async () => {
    const result = await tool('update_automation').handler(makeContext(automationClient()), { automation_id: 'gone' });
    expect(resultText(result)).toBe('Error getting current automation: no config for gone');
  });
});

describe('delete_automation and toggle_automation', () => {
  test('delete reports success', async () => {
    const deleteAutomation = vi.fn(async () => undefined);
    const result = await tool('delete_automation').handler(makeContext(makeFakeClient({ deleteAutomation })), {
      automation_id: '1001'
    });
    expect(resultText(result)).toBe("Automation '1001' deleted successfully");
    expect(deleteAutomation).toHaveBeenCalledWith('1001', undefined);
  });

  test('toggle requires enabled', async () => {
    const toggleAutomation = vi.fn(async () => undefined);
    const ctx = makeContext(makeFakeClient({ toggleAutomation }));
    expect(resultText(await tool('toggle_automation').handler(ctx, { automation_id: 'automation.x' }))).toBe(
      'enabled is required'
    );
    expect(resultText(await tool('toggle_automation').handler(ctx, { automation_id: 'automation.x', enabled: false }))).toBe(
      "Automation 'automation.x' disabled successfully"
    );
    expect(toggleAutomation).toHaveBeenCalledWith('automation.x', false, undefined);
  });

  test('mutating flags match the tool kind', () => {
    expect(automationTools.filter((candidate) => !candidate.mutating).map((candidate) => candidate.name)).toEqual([
      'list_automations',
      'get_automation'
    ]);
  });
});
