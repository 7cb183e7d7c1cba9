export * from './facade';
export * from './store';
export * from './hook';
