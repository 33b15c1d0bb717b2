/**
 * Statement Builder
 *
 * Composes the generated clauses after a base statement. The result is
 * named-placeholder SQL for the caller's own parameterized-query executor.
 *
 * @example
 * ```typescript
 * const sql = updateStatement({
 *   table: 'users',
 *   fields: ['name', 'state'],
 *   conditions: [Conditions.eq('id')],
 * });
 * // UPDATE users SET name = :name, state = :state WHERE id = :id
 * ```
 */

import { CLAUSE_SEPARATORS } from '../constants';
import { defaultClauseBuilder } from '../criteria/clause-builder';
import { valuePlaceholders } from '../criteria/set-clause';
import { InvalidInputError } from '../errors';
import { validateTableName } from '../utils/validation';

import type { Condition } from '../condition/condition';
import type { OrderingEntry } from '../condition/order';
import type { ClauseBuilder } from '../criteria/clause-builder';
import type { SetValues } from '../criteria/set-clause';
import type { RawClauses } from '../criteria/where-clause';

export interface FilterComponents {
  table: string;
  conditions?: readonly Condition[] | null;
  /** Raw WHERE fragments appended after the conditions */
  clauses?: RawClauses | null;
}

export interface UpdateComponents extends FilterComponents {
  fields: readonly string[];
  values?: SetValues | null;
}

export interface SelectComponents extends FilterComponents {
  columns?: readonly string[];
  orderings?: readonly OrderingEntry[] | null;
}

export interface InsertComponents {
  table: string;
  fields: readonly string[];
  values?: SetValues | null;
}

export class StatementBuilder {
  constructor(private readonly clauses: ClauseBuilder = defaultClauseBuilder) {}

  /**
   * INSERT INTO table (a, b) VALUES (:a, :b)
   */
  insert(components: InsertComponents): string {
    validateTableName(components.table);
    requireFields(components.fields, 'INSERT');

    const pairs = valuePlaceholders(
      components.fields,
      components.values,
      this.clauses.placeholderPrefix,
    );

    return compose([
      'INSERT INTO',
      components.table,
      `(${pairs.map(({ field }) => field).join(CLAUSE_SEPARATORS.LIST)})`,
      'VALUES',
      `(${pairs.map(({ placeholder }) => placeholder).join(CLAUSE_SEPARATORS.LIST)})`,
    ]);
  }

  /**
   * UPDATE table SET ... [WHERE ...]
   */
  update(components: UpdateComponents): string {
    validateTableName(components.table);
    requireFields(components.fields, 'UPDATE');

    return compose([
      'UPDATE',
      components.table,
      this.clauses.set(components.fields, components.values),
      this.clauses.where(components.conditions, components.clauses),
    ]);
  }

  /**
   * DELETE FROM table [WHERE ...]
   */
  delete(components: FilterComponents): string {
    validateTableName(components.table);

    return compose([
      'DELETE FROM',
      components.table,
      this.clauses.where(components.conditions, components.clauses),
    ]);
  }

  /**
   * SELECT columns FROM table [WHERE ...] [ORDER BY ...]
   */
  select(components: SelectComponents): string {
    validateTableName(components.table);
    const columns = components.columns?.filter(Boolean) ?? [];

    return compose([
      'SELECT',
      columns.length > 0 ? columns.join(CLAUSE_SEPARATORS.LIST) : '*',
      'FROM',
      components.table,
      this.clauses.where(components.conditions, components.clauses),
      this.clauses.orderBy(components.orderings),
    ]);
  }
}

function requireFields(fields: readonly string[] | null | undefined, statement: string): void {
  if (!fields || fields.length === 0) {
    throw new InvalidInputError(`${statement} requires at least one field`, 'fields');
  }
}

function compose(parts: string[]): string {
  return parts.filter((part) => part.length > 0).join(CLAUSE_SEPARATORS.STATEMENT);
}

const defaultStatementBuilder = new StatementBuilder();

export function insertStatement(components: InsertComponents): string {
  return defaultStatementBuilder.insert(components);
}

export function updateStatement(components: UpdateComponents): string {
  return defaultStatementBuilder.update(components);
}

export function deleteStatement(components: FilterComponents): string {
  return defaultStatementBuilder.delete(components);
}

export function selectStatement(components: SelectComponents): string {
  return defaultStatementBuilder.select(components);
}
