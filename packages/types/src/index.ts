/**
 * @bftsim/types: shared errors, logging and runtime guards.
 *
 * @packageDocumentation
 */

export {
  BftSimError,
  BftSimErrorCode,
  formatError,
  errorMessage,
} from './errors';
export type { BftSimErrorOptions } from './errors';

export {
  Logger,
  LogLevel,
  createLogger,
  parseLogLevel,
  silentLogger,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

export {
  isNonEmptyString,
  isInteger,
  isFiniteNumber,
  isPlainObject,
  isStringArray,
  isOneOf,
  parseIntStrict,
  parseNumberStrict,
} from './guards';

/** Package version reported by the CLI. */
export const BFTSIM_VERSION = '0.1.0';
