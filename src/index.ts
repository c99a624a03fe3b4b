export * from './common/errors';
export { configureLogger, getLogger, Logger } from './common/logger';
export type { LogFormat, LogLevel, LoggerOptions } from './common/logger';
export * from './config';
export * from './fs';
export * from './git';
export * from './locator';
export * from './mirror';
export * from './observability';
export * from './resolver';
