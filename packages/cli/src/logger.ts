import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * CLI logger. Writes to stderr so stdout carries only command output.
 */
export function createLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
  return pino(
    {
      name: 'wgpeers',
      level,
    },
    destination
  );
}
