export * from './benchmark';
export * from './samples';
export * from './generator';
