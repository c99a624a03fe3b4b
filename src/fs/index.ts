export * from './gitfs';
export * from './paths';
export * from './types';
