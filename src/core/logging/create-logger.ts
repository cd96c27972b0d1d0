import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogDestination, LogLevel } from './types.js';

function openDestination(destination: LogDestination): DestinationStream {
  switch (destination.kind) {
    case 'stderr':
      return pino.destination({ dest: 2, sync: true });
    case 'file':
      return pino.destination({ dest: destination.path, sync: true, mkdir: true });
  }
}

/**
 * Root pino logger.
 *
 * - Synchronous writes: the process may be handed off or exit right after a line is logged
 * - Level names instead of numbers, ISO timestamps, `err` serialized with its stack
 */
function createRootLogger(level: LogLevel, destination: LogDestination): Logger {
  return pino(
    {
      level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    openDestination(destination)
  );
}

/**
 * Component loggers over one root. One instance per process, registered in the container.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel, destination: LogDestination = { kind: 'stderr' }) {
    this._root = createRootLogger(level, destination);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
