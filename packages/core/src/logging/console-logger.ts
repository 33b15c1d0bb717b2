import type { Logger } from '../types';

/**
 * Console logger with the library prefix
 */
/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[sql-criteria] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[sql-criteria] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[sql-criteria] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[sql-criteria] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
