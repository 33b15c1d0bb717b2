/**
 * Getting Started
 *
 * Builds statements for an optional-filter search and an update,
 * then hands them to a parameterized-query runner with a name -> value map.
 */

import {
  ClauseBuilder,
  Conditions,
  StatementBuilder,
  asc,
  consoleLogger,
  desc,
  orderBy,
  selectStatement,
  set,
  where,
} from '@sql-criteria/core';

type NamedParams = Record<string, string | number | readonly string[] | null>;

// Stand-in for the caller's executor (mysql2 with namedPlaceholders, better-sqlite3, ...)
function run(sql: string, params: NamedParams): void {
  console.log(sql, params);
}

interface UserSearch {
  name?: string;
  minAge?: number;
  states?: string[];
}

function searchUsers(search: UserSearch): void {
  const sql = selectStatement({
    table: 'users',
    columns: ['id', 'name', 'state'],
    conditions: [
      Conditions.like('name', search.name ? ':name' : null),
      Conditions.ge('age', search.minAge === undefined ? null : ':minAge'),
      Conditions.in('state', search.states ? ':states' : null),
      Conditions.isNull('deleted_at'),
    ],
    orderings: [desc('created_at'), asc('id')],
  });

  run(sql, {
    name: search.name ? `%${search.name}%` : null,
    minAge: search.minAge ?? null,
    states: search.states ?? null,
  });
}

function renameUser(id: number, name: string): void {
  const sql = `UPDATE users ${set(['name', 'updated_at'], [null, 'now'])} ${where([Conditions.eq('id')])}`;
  run(sql, { id, name, now: new Date().toISOString() });
}

function withLogging(): void {
  const clauses = new ClauseBuilder({ placeholderPrefix: '@', logger: consoleLogger });
  const statements = new StatementBuilder(clauses);

  run(statements.delete({ table: 'sessions', conditions: [clauses.conditions.lt('expires_at')] }), {
    expires_at: Date.now(),
  });
  console.log(orderBy([asc('name')]));
}

searchUsers({ name: 'ada', minAge: 30 });
renameUser(1, 'Ada');
withLogging();
