/**
 * Condition Model
 *
 * A condition pairs a field with an operator and an optional value payload.
 * Values are rendered SQL expressions (usually placeholders such as `:name`),
 * never user-supplied literals.
 *
 * @example
 * ```typescript
 * const conditions = [
 *   Conditions.eq('name'),                      // name = :name
 *   Conditions.between('created_at', ':from', ':to'),
 *   Conditions.isNull('deleted_at'),
 * ];
 * ```
 */

import { CLAUSE_DEFAULTS, CLAUSE_SEPARATORS } from '../constants';
import { placeholder } from '../utils/placeholder';

import { Operator } from './operator';

import type { PlaceholderPrefix } from '../constants';

export type ConditionValue =
  | { readonly kind: 'expression'; readonly expression: string }
  | { readonly kind: 'range'; readonly lower: string; readonly upper: string };

export interface Condition {
  readonly field: string;
  readonly operator: Operator;
  readonly value?: ConditionValue;
}

/**
 * Runtime guard for payloads from untyped callers
 */
export function isConditionValue(value: unknown): value is ConditionValue {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  if (value.kind === 'expression') {
    return 'expression' in value && typeof value.expression === 'string';
  }
  if (value.kind === 'range') {
    return (
      'lower' in value &&
      typeof value.lower === 'string' &&
      'upper' in value &&
      typeof value.upper === 'string'
    );
  }
  return false;
}

export function expression(text: string): ConditionValue {
  return { kind: 'expression', expression: text };
}

export function range(lower: string, upper: string): ConditionValue {
  return { kind: 'range', lower, upper };
}

/**
 * Value argument of the scalar factories.
 * `undefined` defaults to the field's own placeholder, `null` means no value.
 */
export type ExpressionArg = string | null | undefined;

export type MembersArg = string | readonly string[] | null | undefined;

export interface ConditionFactory {
  eq(field: string, value?: ExpressionArg): Condition;
  ne(field: string, value?: ExpressionArg): Condition;
  notEq(field: string, value?: ExpressionArg): Condition;
  gt(field: string, value?: ExpressionArg): Condition;
  ge(field: string, value?: ExpressionArg): Condition;
  lt(field: string, value?: ExpressionArg): Condition;
  le(field: string, value?: ExpressionArg): Condition;
  like(field: string, value?: ExpressionArg): Condition;
  notLike(field: string, value?: ExpressionArg): Condition;
  between(field: string, lower?: string | null, upper?: string | null): Condition;
  notBetween(field: string, lower?: string | null, upper?: string | null): Condition;
  isNull(field: string): Condition;
  isNotNull(field: string): Condition;
  in(field: string, members?: MembersArg): Condition;
  notIn(field: string, members?: MembersArg): Condition;
}

function joinMembers(members: MembersArg): string | null | undefined {
  if (typeof members === 'string' || members === null || members === undefined) {
    return members;
  }
  return members.filter(Boolean).join(CLAUSE_SEPARATORS.MEMBER);
}

/**
 * Create condition factories whose default values use the given placeholder prefix
 */
export function createConditions(
  prefix: PlaceholderPrefix = CLAUSE_DEFAULTS.PLACEHOLDER_PREFIX,
): ConditionFactory {
  const scalar =
    (operator: Operator) =>
    (field: string, value?: ExpressionArg): Condition => {
      const resolved = value === undefined && field ? placeholder(field, prefix) : value;
      return resolved ? { field, operator, value: expression(resolved) } : { field, operator };
    };

  const bounded =
    (operator: Operator) =>
    (field: string, lower?: string | null, upper?: string | null): Condition =>
      lower && upper ? { field, operator, value: range(lower, upper) } : { field, operator };

  const membership =
    (operator: Operator) =>
    (field: string, members?: MembersArg): Condition => {
      const resolved =
        members === undefined && field ? placeholder(field, prefix) : joinMembers(members);
      return resolved ? { field, operator, value: expression(resolved) } : { field, operator };
    };

  return {
    eq: scalar(Operator.EQ),
    ne: scalar(Operator.NE),
    notEq: scalar(Operator.NOT_EQ),
    gt: scalar(Operator.GT),
    ge: scalar(Operator.GE),
    lt: scalar(Operator.LT),
    le: scalar(Operator.LE),
    like: scalar(Operator.LIKE),
    notLike: scalar(Operator.NOT_LIKE),
    between: bounded(Operator.BETWEEN),
    notBetween: bounded(Operator.NOT_BETWEEN),
    isNull: (field) => ({ field, operator: Operator.IS_NULL }),
    isNotNull: (field) => ({ field, operator: Operator.IS_NOT_NULL }),
    in: membership(Operator.IN),
    notIn: membership(Operator.NOT_IN),
  };
}

export const Conditions: ConditionFactory = createConditions();
