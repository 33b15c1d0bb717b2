export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './condition';
export * from './criteria';
export * from './statement';
export * from './logging';
