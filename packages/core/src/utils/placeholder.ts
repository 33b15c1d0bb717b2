import { CLAUSE_DEFAULTS, PLACEHOLDER_PREFIXES } from '../constants';
import { InvalidInputError } from '../errors';

import type { PlaceholderPrefix } from '../constants';

export function isPlaceholderPrefix(value: unknown): value is PlaceholderPrefix {
  return PLACEHOLDER_PREFIXES.some((prefix) => prefix === value);
}

/**
 * Named bind-parameter reference for a value token: `name` -> `:name`
 */
export function placeholder(
  token: string,
  prefix: PlaceholderPrefix = CLAUSE_DEFAULTS.PLACEHOLDER_PREFIX,
): string {
  if (!token || typeof token !== 'string') {
    throw new InvalidInputError('Placeholder token must be a non-empty string');
  }
  if (!isPlaceholderPrefix(prefix)) {
    throw new InvalidInputError(
      `Placeholder prefix must be one of ${PLACEHOLDER_PREFIXES.join(' ')}`,
      'placeholderPrefix',
    );
  }
  return `${prefix}${token}`;
}
