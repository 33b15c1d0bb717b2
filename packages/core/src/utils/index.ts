export * from './placeholder';
export * from './join';
export * from './validation';
