/**
 * SET clause
 *
 * `set(['name', 'state'])`            -> `SET name = :name, state = :state`
 * `set(['name', 'state'], ['n', ''])` -> `SET name = :n, state = :state`
 */

import { CLAUSE_KEYWORDS, CLAUSE_SEPARATORS } from '../constants';
import { InvalidInputError } from '../errors';
import { prefixClause } from '../utils/join';
import { placeholder } from '../utils/placeholder';
import { checkFields } from '../utils/validation';

import type { PlaceholderPrefix } from '../constants';

export type SetValues = readonly (string | null | undefined)[];

export interface FieldPlaceholder {
  field: string;
  placeholder: string;
}

/**
 * Placeholder for each field's value, falling back to the field name
 */
export function valuePlaceholders(
  fields: readonly string[],
  values: SetValues | null | undefined,
  prefix: PlaceholderPrefix,
): FieldPlaceholder[] {
  checkFields(fields);

  if (values && values.length !== fields.length) {
    throw new InvalidInputError(
      `The length of fields (${fields.length}) and values (${values.length}) should be the same`,
      'values',
    );
  }

  return fields.map((field, index) => ({
    field,
    placeholder: placeholder(values?.[index] || field, prefix),
  }));
}

export function buildSetClause(
  fields: readonly string[] | null | undefined,
  values: SetValues | null | undefined,
  prefix: PlaceholderPrefix,
): string {
  if (!fields || fields.length === 0) {
    return '';
  }
  const assignments = valuePlaceholders(fields, values, prefix).map(
    ({ field, placeholder: value }) => `${field} = ${value}`,
  );
  return prefixClause(CLAUSE_KEYWORDS.SET, assignments, CLAUSE_SEPARATORS.LIST);
}
