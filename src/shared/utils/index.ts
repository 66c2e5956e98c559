export { logger, Logger, LogLevel, parseLogLevel } from './logger';
export type { LogMeta, LogSink } from './logger';
export { generateId } from './uuid';
export { waitWithTimeout } from './timeout';
export type { WaitOutcome } from './timeout';
