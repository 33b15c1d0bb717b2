import { describe, it, expect } from 'vitest';

import { InvalidInputError } from '../../errors';
import { set } from '../clause-builder';
import { buildSetClause } from '../set-clause';

describe('set', () => {
  it('should return an empty clause for no fields', () => {
    expect(set([])).toBe('');
    expect(set(null)).toBe('');
    expect(set(undefined, ['x'])).toBe('');
  });

  it('should use the field name as placeholder when values are absent', () => {
    expect(set(['a', 'b'], null)).toBe('SET a = :a, b = :b');
    expect(set(['name', 'state'])).toBe('SET name = :name, state = :state');
  });

  it('should use custom value placeholders', () => {
    expect(set(['name', 'state'], ['test_name', 'test_state'])).toBe(
      'SET name = :test_name, state = :test_state',
    );
  });

  it('should fall back to the field name for blank values', () => {
    expect(set(['a', 'b'], ['x', ''])).toBe('SET a = :x, b = :b');
    expect(set(['name', 'state'], [null, 'test_state'])).toBe(
      'SET name = :name, state = :test_state',
    );
  });

  it('should fail on length mismatch', () => {
    expect(() => set(['a'], ['x', 'y'])).toThrow(InvalidInputError);
    expect(() => set(['a', 'b'], ['x'])).toThrow(
      'The length of fields (2) and values (1) should be the same',
    );
  });

  it('should fail on an empty field', () => {
    expect(() => set(['a', ''])).toThrow(InvalidInputError);
  });

  it('should validate fields before values', () => {
    expect(() => set([''], ['x', 'y'])).toThrow('Field at index 0 in fields is null or empty');
  });

  it('should honor the placeholder prefix', () => {
    expect(buildSetClause(['a', 'b'], ['x', null], '$')).toBe('SET a = $x, b = $b');
  });

  it('should be idempotent', () => {
    const fields = ['a', 'b'];
    expect(set(fields)).toBe(set(fields));
  });
});
