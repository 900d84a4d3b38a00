import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';
import type { LogLevel } from '../types/config.types.js';

/** The slice of pino every component depends on. Injected, never global. */
export type Logger = Pick<PinoLogger, 'debug' | 'info' | 'warn' | 'error' | 'child'>;

export interface LoggerOptions {
  level: LogLevel;
  name?: string;
}

/**
 * Builds the root logger. Records go to stderr unless a destination is given,
 * so stdout stays usable for command output.
 */
export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  return pino(
    {
      name: options.name ?? 'textgen-bridge',
      level: options.level,
    },
    destination ?? pino.destination(2),
  );
}
