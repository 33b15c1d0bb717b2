/**
 * Clause Builder
 *
 * Configured entry point for the SET, WHERE and ORDER BY builders.
 * Holds only immutable configuration, so one instance can be shared freely.
 *
 * @example
 * ```typescript
 * const clauses = new ClauseBuilder({ logger: consoleLogger });
 *
 * const sql = [
 *   'UPDATE users',
 *   clauses.set(['name', 'state']),
 *   clauses.where([clauses.conditions.eq('id')]),
 * ].join(' ');
 * // UPDATE users SET name = :name, state = :state WHERE id = :id
 * ```
 */

import { CLAUSE_DEFAULTS } from '../constants';
import { createConditions } from '../condition/condition';
import { InvalidInputError } from '../errors';
import { truncateSql } from '../logging/console-logger';
import { isPlaceholderPrefix, placeholder } from '../utils/placeholder';

import { buildOrderByClause } from './order-by-clause';
import { buildSetClause } from './set-clause';
import { buildWhereClause } from './where-clause';

import type { Condition, ConditionFactory } from '../condition/condition';
import type { OrderingEntry } from '../condition/order';
import type { PlaceholderPrefix } from '../constants';
import type { ClauseKind, LogLevel, Logger } from '../types';
import type { SetValues } from './set-clause';
import type { RawClauses } from './where-clause';

export interface ClauseBuilderOptions {
  /** Named-parameter prefix, `:` by default */
  placeholderPrefix?: PlaceholderPrefix;
  /** Receives one entry per built clause */
  logger?: Logger;
  logLevel?: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export class ClauseBuilder {
  readonly placeholderPrefix: PlaceholderPrefix;
  readonly conditions: ConditionFactory;
  private readonly logger?: Logger;
  private readonly logLevel: LogLevel;

  constructor(options: ClauseBuilderOptions = {}) {
    const {
      placeholderPrefix = CLAUSE_DEFAULTS.PLACEHOLDER_PREFIX,
      logger,
      logLevel = CLAUSE_DEFAULTS.LOG_LEVEL,
    } = options;

    if (!isPlaceholderPrefix(placeholderPrefix)) {
      throw new InvalidInputError(
        `Unsupported placeholder prefix "${String(placeholderPrefix)}"`,
        'placeholderPrefix',
      );
    }
    if (!LOG_LEVELS.includes(logLevel)) {
      throw new InvalidInputError(`Unsupported log level "${String(logLevel)}"`, 'logLevel');
    }

    this.placeholderPrefix = placeholderPrefix;
    this.conditions = createConditions(placeholderPrefix);
    this.logger = logger;
    this.logLevel = logLevel;
  }

  /**
   * `SET f1 = :v1, f2 = :v2`, or `''` for no fields
   */
  set(fields: readonly string[] | null | undefined, values?: SetValues | null): string {
    return this.trace('set', buildSetClause(fields, values, this.placeholderPrefix));
  }

  /**
   * `WHERE c1 AND c2 AND raw`, or `''` when nothing renders
   */
  where(conditions?: readonly Condition[] | null, rawClauses?: RawClauses | null): string {
    return this.trace('where', buildWhereClause(conditions, rawClauses));
  }

  /**
   * `ORDER BY f1 ASC,f2 DESC`, or `''` when no entry has a field
   */
  orderBy(orderings: readonly OrderingEntry[] | null | undefined): string {
    return this.trace('orderBy', buildOrderByClause(orderings));
  }

  placeholder(token: string): string {
    return placeholder(token, this.placeholderPrefix);
  }

  private trace(kind: ClauseKind, clause: string): string {
    this.logger?.[this.logLevel](`Built ${kind} clause: ${truncateSql(clause) || '(empty)'}`);
    return clause;
  }
}

export const defaultClauseBuilder = new ClauseBuilder();

export function set(fields: readonly string[] | null | undefined, values?: SetValues | null): string {
  return defaultClauseBuilder.set(fields, values);
}

export function where(
  conditions?: readonly Condition[] | null,
  rawClauses?: RawClauses | null,
): string {
  return defaultClauseBuilder.where(conditions, rawClauses);
}

export function orderBy(orderings: readonly OrderingEntry[] | null | undefined): string {
  return defaultClauseBuilder.orderBy(orderings);
}
