export * from './grid';
export * from './pool';
export * from './execution';
export * from './events';
