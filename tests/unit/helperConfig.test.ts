import { describe, expect, test } from 'vitest';

import { buildHelperConfig } from '../../src/tools/helperConfig.js';

describe('buildHelperConfig', () => {
  test('skips empty strings', () => {
    expect(buildHelperConfig('input_boolean', 'Guest mode', { icon: '' })).toEqual({ name: 'Guest mode' });
  });

  test('returns undefined for an unknown platform', () => {
    expect(buildHelperConfig('template', 'X', {})).toBeUndefined();
    expect(buildHelperConfig('input_button', 'X', {})).toEqual({ name: 'X' });
  });

  test('copies input_number fields of the expected type only', () => {
    expect(
      buildHelperConfig('input_number', 'Volume', {
        min: 0,
        max: '100',
        step: 5,
        mode: 'slider',
        unit_of_measurement: '%',
        pattern: 'ignored'
      })
    ).toEqual({ name: 'Volume', min: 0, step: 5, mode: 'slider', unit_of_measurement: '%' });
  });

  test('keeps string options of an input_select', () => {
    expect(buildHelperConfig('input_select', 'Mode', { options: ['home', 3, 'away'], initial: 'home' })).toEqual({
      name: 'Mode',
      options: ['home', 'away'],
      initial: 'home'
    });
  });

  test('copies counter and timer fields', () => {
    expect(buildHelperConfig('counter', 'Visits', { initial: 1, minimum: 0, maximum: 10, step: 1, restore: false })).toEqual({
      name: 'Visits',
      initial: 1,
      minimum: 0,
      maximum: 10,
      step: 1,
      restore: false
    });
    expect(buildHelperConfig('timer', 'Laundry', { duration: '00:45:00', restore: true, icon: 'mdi:timer' })).toEqual({
      name: 'Laundry',
      icon: 'mdi:timer',
      duration: '00:45:00',
      restore: true
    });
  });

  test('copies non-empty schedule days', () => {
    expect(
      buildHelperConfig('schedule', 'Work', {
        monday: [{ from: '08:00:00', to: '17:00:00' }],
        tuesday: [],
        funday: [{ from: '00:00:00', to: '23:59:59' }]
      })
    ).toEqual({ name: 'Work', monday: [{ from: '08:00:00', to: '17:00:00' }] });
  });
});
