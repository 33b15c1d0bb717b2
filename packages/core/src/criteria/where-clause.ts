/**
 * WHERE clause
 *
 * Structured conditions render first, raw fragments follow verbatim,
 * and everything is joined with ` AND `.
 */

import { CLAUSE_KEYWORDS, CLAUSE_SEPARATORS } from '../constants';
import { prefixClause } from '../utils/join';
import { checkConditions } from '../utils/validation';

import { renderCondition } from './condition-renderer';

import type { Condition } from '../condition/condition';

export type RawClauses = readonly (string | null | undefined)[];

export function buildWhereClause(
  conditions: readonly Condition[] | null | undefined,
  rawClauses: RawClauses | null | undefined,
): string {
  const fragments: string[] = [];

  if (conditions && conditions.length > 0) {
    checkConditions(conditions);
    fragments.push(...conditions.map(renderCondition));
  }

  if (rawClauses) {
    for (const raw of rawClauses) {
      if (raw) {
        fragments.push(raw);
      }
    }
  }

  return prefixClause(CLAUSE_KEYWORDS.WHERE, fragments, CLAUSE_SEPARATORS.CONDITION);
}
