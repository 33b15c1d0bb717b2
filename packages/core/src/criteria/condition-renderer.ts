/**
 * Condition Renderer
 *
 * Renders one condition to a WHERE fragment by operator category:
 * - comparison: `field OP value`
 * - range:      `field OP lower AND upper`
 * - nullity:    `field OP`
 * - membership: `field OP (value)`
 *
 * A condition that needs a value but has none renders to `''`.
 */

import { operatorCategory, operatorSql } from '../condition/operator';
import { InvalidInputError } from '../errors';

import type { Condition } from '../condition/condition';

export function renderCondition(condition: Condition): string {
  const { field, operator, value } = condition;
  const sqlOperator = operatorSql(operator);

  switch (operatorCategory(operator)) {
    case 'comparison': {
      const expression = singleExpression(condition);
      return expression ? `${field} ${sqlOperator} ${expression}` : '';
    }

    case 'range': {
      if (!value) {
        return '';
      }
      if (value.kind !== 'range') {
        throw new InvalidInputError(
          `${operator} condition on "${field}" requires a lower and upper bound`,
          field,
        );
      }
      return value.lower && value.upper
        ? `${field} ${sqlOperator} ${value.lower} AND ${value.upper}`
        : '';
    }

    case 'nullity': {
      return `${field} ${sqlOperator}`;
    }

    case 'membership': {
      const expression = singleExpression(condition);
      return expression ? `${field} ${sqlOperator} (${expression})` : '';
    }
  }
}

function singleExpression({ field, operator, value }: Condition): string | undefined {
  if (!value) {
    return undefined;
  }
  switch (value.kind) {
    case 'expression': {
      return value.expression;
    }
    case 'range': {
      throw new InvalidInputError(
        `${operator} condition on "${field}" takes a single expression, not a range`,
        field,
      );
    }
  }
}
