export * from './casefold';
export * from './errors';
export * from './logger';
