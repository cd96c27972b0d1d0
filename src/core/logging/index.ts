// Types
export type { Logger, ILoggerFactory, LogLevel, LogDestination } from './types.js';
export { LOG_LEVELS } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-config code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
