/**
 * @tunegrab/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Keyed serial queue
 * - Path utilities
 * - Type guards
 */

// Command execution
export {
  executeCommand,
  execFFmpeg,
  CommandFailedError,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  makeTempDir,
  safeWriteFile,
  atomicWriteFile,
  safeReadFile,
  safeStat,
  listFiles,
  moveFile,
  removePaths,
  type FileEntry,
} from './file.js';

// Retry logic
export { retry, backoffDelay, defaultRetryOptions, type RetryOptions } from './retry.js';

// Serialisation per key
export { KeyedQueue } from './keyedQueue.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  getBasename,
  replaceExtension,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  isArray,
  dig,
  digString,
  digArray,
} from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatInterval,
  parseDuration,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, LOG_LEVELS, type Logger, type LogLevel } from './logger.js';
