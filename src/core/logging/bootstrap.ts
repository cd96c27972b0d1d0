import { PinoLoggerFactory } from './create-logger.js';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';

/**
 * Logger for code that runs before configuration is parsed
 * (config errors themselves, the container wiring).
 *
 * After config is loaded, use the container's ILoggerFactory instead.
 */
let _bootstrapFactory: PinoLoggerFactory | null = null;

function readLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'warn';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapFactory) {
    _bootstrapFactory = new PinoLoggerFactory(readLevel(process.env['KICKSTAND_LOG_LEVEL']));
  }
  return _bootstrapFactory.root;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
