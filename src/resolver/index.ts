export * from './revision';
export * from './types';
