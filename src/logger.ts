import { pino, type Level, type Logger } from 'pino';

export type LogLevel = Level | 'silent';

/** Engine logger. Silent unless a level is given. */
export function createLogger(level: LogLevel = 'silent'): Logger {
  return pino({ name: 'docquery', level });
}
