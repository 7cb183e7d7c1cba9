export * from './types';
export * from './compiler';
