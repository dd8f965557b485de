export type { Logger, LogLevel } from './logger';
export { createLogger, isLogLevel, resolveLogLevel, setDefaultLogLevel } from './logger';
