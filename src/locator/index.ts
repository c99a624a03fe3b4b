export * from './endpoint';
export * from './types';
