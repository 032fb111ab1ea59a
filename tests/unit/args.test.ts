import { describe, expect, test } from 'vitest';

import {
  getArray,
  getBoolean,
  getNumber,
  getOptionalString,
  getRecord,
  getString,
  getStringArray,
  requireDomainEntityId
} from '../../src/tools/args.js';

describe('argument extractors', () => {
  const args = {
    name: 'Kitchen',
    empty: '',
    count: 3,
    nan: Number.NaN,
    flag: false,
    list: ['a', 1, 'b'],
    mapping: { a: 1 }
  };

  test('return typed values or defaults', () => {
    expect(getString(args, 'name')).toBe('Kitchen');
    expect(getString(args, 'count')).toBe('');
    expect(getOptionalString(args, 'empty')).toBe('');
    expect(getOptionalString(args, 'missing')).toBeUndefined();
    expect(getNumber(args, 'count')).toBe(3);
    expect(getNumber(args, 'nan')).toBeUndefined();
    expect(getBoolean(args, 'flag')).toBe(false);
    expect(getBoolean(args, 'name')).toBeUndefined();
    expect(getArray(args, 'list')).toEqual(['a', 1, 'b']);
    expect(getStringArray(args, 'list')).toEqual(['a', 'b']);
    expect(getStringArray(args, 'missing')).toBeUndefined();
    expect(getRecord(args, 'mapping')).toEqual({ a: 1 });
    expect(getRecord(args, 'list')).toBeUndefined();
  });

  test('check the domain of entity_id', () => {
    expect(requireDomainEntityId({}, 'timer', 'timer.my_timer')).toEqual({ error: 'entity_id is required' });
    expect(requireDomainEntityId({ entity_id: 'light.x' }, 'timer', 'timer.my_timer')).toEqual({
      error: 'entity_id must be a timer entity (e.g., timer.my_timer)'
    });
    expect(requireDomainEntityId({ entity_id: 'light.x' }, 'input_select', 'input_select.my_dropdown')).toEqual({
      error: 'entity_id must be an input_select entity (e.g., input_select.my_dropdown)'
    });
    expect(requireDomainEntityId({ entity_id: 'timer.tea' }, 'timer', 'timer.my_timer')).toEqual({ entityId: 'timer.tea' });
  });
});
