/**
 * Operator Table
 *
 * Closed set of condition operators and their SQL tokens.
 * The rendering category of a condition is decided by its operator alone,
 * never by the shape of its value.
 */

export const Operator = {
  EQ: 'EQ',
  NE: 'NE',
  NOT_EQ: 'NOT_EQ',
  GT: 'GT',
  GE: 'GE',
  LT: 'LT',
  LE: 'LE',
  LIKE: 'LIKE',
  NOT_LIKE: 'NOT_LIKE',
  BETWEEN: 'BETWEEN',
  NOT_BETWEEN: 'NOT_BETWEEN',
  IS_NULL: 'IS_NULL',
  IS_NOT_NULL: 'IS_NOT_NULL',
  IN: 'IN',
  NOT_IN: 'NOT_IN',
} as const;

export type Operator = (typeof Operator)[keyof typeof Operator];

export type OperatorCategory = 'comparison' | 'range' | 'nullity' | 'membership';

const OPERATORS: readonly string[] = Object.values(Operator);

/**
 * Literal SQL token for an operator
 */
export function operatorSql(operator: Operator): string {
  switch (operator) {
    case 'EQ': {
      return '=';
    }
    case 'NE': {
      return '<>';
    }
    case 'NOT_EQ': {
      return '!=';
    }
    case 'GT': {
      return '>';
    }
    case 'GE': {
      return '>=';
    }
    case 'LT': {
      return '<';
    }
    case 'LE': {
      return '<=';
    }
    case 'LIKE': {
      return 'LIKE';
    }
    case 'NOT_LIKE': {
      return 'NOT LIKE';
    }
    case 'BETWEEN': {
      return 'BETWEEN';
    }
    case 'NOT_BETWEEN': {
      return 'NOT BETWEEN';
    }
    case 'IS_NULL': {
      return 'IS NULL';
    }
    case 'IS_NOT_NULL': {
      return 'IS NOT NULL';
    }
    case 'IN': {
      return 'IN';
    }
    case 'NOT_IN': {
      return 'NOT IN';
    }
  }
}

export function operatorCategory(operator: Operator): OperatorCategory {
  switch (operator) {
    case 'EQ':
    case 'NE':
    case 'NOT_EQ':
    case 'GT':
    case 'GE':
    case 'LT':
    case 'LE':
    case 'LIKE':
    case 'NOT_LIKE': {
      return 'comparison';
    }
    case 'BETWEEN':
    case 'NOT_BETWEEN': {
      return 'range';
    }
    case 'IS_NULL':
    case 'IS_NOT_NULL': {
      return 'nullity';
    }
    case 'IN':
    case 'NOT_IN': {
      return 'membership';
    }
  }
}

export function isOperator(value: unknown): value is Operator {
  return typeof value === 'string' && OPERATORS.includes(value);
}
