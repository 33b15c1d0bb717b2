export * from './operator';
export * from './order';
export * from './condition';
