export * from './eviction';
export * from './lock';
export * from './manager';
