export * from './types';
export * from './location';
export * from './scanner';
