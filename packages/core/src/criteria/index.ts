export * from './clause-builder';
export { renderCondition } from './condition-renderer';
export type { SetValues } from './set-clause';
export type { RawClauses } from './where-clause';
