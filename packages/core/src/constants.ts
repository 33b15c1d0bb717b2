/**
 * Constants
 *
 * Centralized clause-building defaults.
 */

// ============ Placeholder Defaults ============

/**
 * Named-parameter prefixes accepted by Node query layers
 * (mysql2 `namedPlaceholders`, better-sqlite3, node-sqlite).
 */
export const PLACEHOLDER_PREFIXES = [':', '@', '$'] as const;

export type PlaceholderPrefix = (typeof PLACEHOLDER_PREFIXES)[number];

// ============ Clause Defaults ============

export const CLAUSE_DEFAULTS = {
  /** Default named-parameter prefix */
  PLACEHOLDER_PREFIX: ':',
  /** Default log level for built clauses */
  LOG_LEVEL: 'debug',
} as const;

// ============ Separators ============

export const CLAUSE_SEPARATORS = {
  /** Between `field = :value` pairs and column lists */
  LIST: ', ',
  /** Between WHERE fragments */
  CONDITION: ' AND ',
  /** Between ORDER BY entries */
  ORDER: ',',
  /** Between IN-list members */
  MEMBER: ',',
  /** Between statement parts */
  STATEMENT: ' ',
} as const;

// ============ Keywords ============

export const CLAUSE_KEYWORDS = {
  SET: 'SET',
  WHERE: 'WHERE',
  ORDER_BY: 'ORDER BY',
} as const;
