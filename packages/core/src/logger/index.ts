export { createLogger, isLogLevel, LOG_LEVELS } from './logger';
export type { Logger, LogLevel } from './logger';
