export * from './common';
export * from './matchers';
export * from './compiler';
export * from './scanner';
export * from './check';
export * from './config';
export * from './observability';
export * from './bench';
export { createServer } from './api/server';
export type { ServerOptions } from './api/server';
