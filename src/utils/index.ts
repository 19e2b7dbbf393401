export * from './logger';
export * from './units';
