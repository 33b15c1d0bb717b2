export * from './console-logger';
