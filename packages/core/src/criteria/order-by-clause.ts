import { CLAUSE_KEYWORDS, CLAUSE_SEPARATORS } from '../constants';
import { isOrder, orderSql } from '../condition/order';
import { InvalidInputError } from '../errors';
import { prefixClause } from '../utils/join';

import type { OrderingEntry } from '../condition/order';

/**
 * `ORDER BY name ASC,date DESC`; entries with a blank field are skipped,
 * an unknown direction on a present field fails
 */
export function buildOrderByClause(orderings: readonly OrderingEntry[] | null | undefined): string {
  if (!orderings || orderings.length === 0) {
    return '';
  }

  const entries = orderings
    .filter((entry) => entry && entry.field)
    .map(({ field, direction }) => {
      if (!isOrder(direction)) {
        throw new InvalidInputError(
          `Ordering on "${field}" has an unknown direction "${String(direction)}"`,
          field,
        );
      }
      return `${field} ${orderSql(direction)}`;
    });

  return prefixClause(CLAUSE_KEYWORDS.ORDER_BY, entries, CLAUSE_SEPARATORS.ORDER);
}
