export * from './loader';
export * from './types';
