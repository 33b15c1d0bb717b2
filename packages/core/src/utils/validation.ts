import { isConditionValue } from '../condition/condition';
import { isOperator } from '../condition/operator';
import { InvalidInputError } from '../errors';

import type { Condition } from '../condition/condition';

export function validateFieldName(field: unknown, label = 'field'): void {
  if (!field || typeof field !== 'string') {
    throw new InvalidInputError(`${label} must be a non-empty string`, label);
  }
}

export function validateTableName(table: unknown): void {
  validateFieldName(table, 'table');
}

/**
 * Every field must be a non-empty string
 */
export function checkFields(fields: readonly string[]): void {
  fields.forEach((field, index) => {
    if (!field || typeof field !== 'string') {
      throw new InvalidInputError(
        `Field at index ${index} in fields is null or empty`,
        `fields[${index}]`,
      );
    }
  });
}

/**
 * Every condition must carry a non-empty field, a known operator
 * and, when a value is present, a well-formed payload
 */
export function checkConditions(conditions: readonly Condition[]): void {
  conditions.forEach((condition, index) => {
    if (!condition || !condition.field || typeof condition.field !== 'string') {
      throw new InvalidInputError(
        `Condition at index ${index} has a null or empty field`,
        `conditions[${index}].field`,
      );
    }
    if (!isOperator(condition.operator)) {
      throw new InvalidInputError(
        `Condition on "${condition.field}" has a missing or unknown operator`,
        condition.field,
      );
    }
    const { value } = condition;
    if (value !== null && value !== undefined && !isConditionValue(value)) {
      throw new InvalidInputError(
        `Condition on "${condition.field}" has a malformed value; expected an expression or a range`,
        `conditions[${index}].value`,
      );
    }
  });
}
