import { describe, it, expect } from 'vitest';

import { Conditions, expression, range } from '../../condition/condition';
import { Operator } from '../../condition/operator';
import { InvalidInputError } from '../../errors';
import { where } from '../clause-builder';
import { renderCondition } from '../condition-renderer';

import type { Condition } from '../../condition/condition';

const eqName: Condition = { field: 'name', operator: Operator.EQ, value: expression(':name') };

describe('renderCondition', () => {
  it('should render binary comparisons', () => {
    expect(renderCondition(eqName)).toBe('name = :name');
    expect(renderCondition(Conditions.ne('state'))).toBe('state <> :state');
    expect(renderCondition(Conditions.notEq('state'))).toBe('state != :state');
    expect(renderCondition(Conditions.ge('age', ':min'))).toBe('age >= :min');
    expect(renderCondition(Conditions.notLike('title', ':pattern'))).toBe(
      'title NOT LIKE :pattern',
    );
  });

  it('should render ranges', () => {
    expect(
      renderCondition({ field: 'date', operator: Operator.BETWEEN, value: range(':lo', ':hi') }),
    ).toBe('date BETWEEN :lo AND :hi');
    expect(renderCondition(Conditions.notBetween('price', ':a', ':b'))).toBe(
      'price NOT BETWEEN :a AND :b',
    );
  });

  it('should render nullity checks without a value', () => {
    expect(renderCondition({ field: 'deleted_at', operator: Operator.IS_NULL })).toBe(
      'deleted_at IS NULL',
    );
    expect(renderCondition(Conditions.isNotNull('deleted_at'))).toBe('deleted_at IS NOT NULL');
  });

  it('should render membership in parentheses', () => {
    expect(renderCondition(Conditions.in('id', ':ids'))).toBe('id IN (:ids)');
    expect(renderCondition(Conditions.notIn('id', ['1', '2', '3']))).toBe('id NOT IN (1,2,3)');
  });

  it('should render nothing for a condition missing its value', () => {
    expect(renderCondition({ field: 'name', operator: Operator.EQ })).toBe('');
    expect(renderCondition({ field: 'date', operator: Operator.BETWEEN })).toBe('');
    expect(renderCondition({ field: 'id', operator: Operator.IN })).toBe('');
    expect(renderCondition({ field: 'name', operator: Operator.EQ, value: expression('') })).toBe(
      '',
    );
  });

  it('should fail when a range operator gets a single expression', () => {
    expect(() =>
      renderCondition({ field: 'date', operator: Operator.BETWEEN, value: expression(':d') }),
    ).toThrow(InvalidInputError);
  });

  it('should fail when a comparison gets a range', () => {
    expect(() =>
      renderCondition({ field: 'age', operator: Operator.GT, value: range(':a', ':b') }),
    ).toThrow('GT condition on "age" takes a single expression, not a range');
  });
});

describe('where', () => {
  it('should return an empty clause for no input', () => {
    expect(where([], [])).toBe('');
    expect(where()).toBe('');
    expect(where(null, null)).toBe('');
  });

  it('should prefix a single condition', () => {
    expect(where([eqName])).toBe('WHERE name = :name');
  });

  it('should join conditions with AND', () => {
    expect(where([Conditions.eq('name'), Conditions.gt('date')])).toBe(
      'WHERE name = :name AND date > :date',
    );
  });

  it('should drop conditions without a value', () => {
    expect(where([{ field: 'name', operator: Operator.EQ }])).toBe('');
    expect(
      where([
        Conditions.eq('name', null),
        Conditions.isNull('deleted_at'),
        Conditions.like('title', null),
      ]),
    ).toBe('WHERE deleted_at IS NULL');
  });

  it('should append raw clauses after conditions', () => {
    expect(where([eqName], ['OR state = :s'])).toBe('WHERE name = :name AND OR state = :s');
  });

  it('should drop empty raw clauses', () => {
    expect(where(null, ['', null, 'a = 1', undefined])).toBe('WHERE a = 1');
    expect(where([], ['', null])).toBe('');
  });

  it('should fail on a condition with an empty field', () => {
    expect(() => where([eqName, { field: '', operator: Operator.EQ }])).toThrow(
      InvalidInputError,
    );
  });

  it('should validate every condition before rendering', () => {
    const conditions: Condition[] = [
      { field: 'date', operator: Operator.BETWEEN, value: expression(':d') },
      { field: '', operator: Operator.EQ },
    ];
    expect(() => where(conditions)).toThrow('Condition at index 1 has a null or empty field');
  });

  it('should fail on a value that is neither an expression nor a range', () => {
    const conditions = JSON.parse('[{"field":"name","operator":"EQ","value":":name"}]') as Condition[];

    expect(() => where(conditions)).toThrow(
      'Condition on "name" has a malformed value; expected an expression or a range',
    );
  });

  it('should fail on an unknown value kind', () => {
    const conditions = JSON.parse(
      '[{"field":"id","operator":"IN","value":{"kind":"list","members":[":a"]}}]',
    ) as Condition[];

    expect(() => where(conditions)).toThrow(InvalidInputError);
  });

  it('should be idempotent', () => {
    const conditions = [Conditions.eq('name'), Conditions.between('date', ':lo', ':hi')];
    const raw = ['OR state = :s'];

    expect(where(conditions, raw)).toBe(
      'WHERE name = :name AND date BETWEEN :lo AND :hi AND OR state = :s',
    );
    expect(where(conditions, raw)).toBe(where(conditions, raw));
  });

  it('should never emit stray separators', () => {
    const clause = where(
      [Conditions.eq('a', null), Conditions.eq('b'), Conditions.in('c', [])],
      ['', 'd = 1'],
    );
    expect(clause).toBe('WHERE b = :b AND d = 1');
  });
});
