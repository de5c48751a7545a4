import { stdTimeFunctions, type LoggerOptions } from 'pino';

export function createLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime
  };
}
