/**
 * Observability: per-check log files
 */

export {
  appendToLog,
  getLogPath,
  type LogOptions,
  logFileStem,
  makeLogOptions,
  writeCheckLog,
} from './logger.ts';
