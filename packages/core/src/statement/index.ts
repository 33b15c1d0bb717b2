export * from './statement-builder';
