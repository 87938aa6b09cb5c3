/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  timed,
} from './logger';
export type { LogContext, LoggerConfig, StructuredLogger, DomainLogMethods } from './logger';
