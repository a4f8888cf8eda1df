/**
 * Logger factory using Pino
 * Logs go to stderr; stdout carries only the report summary
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty: boolean;
}

const STDERR_FD = 2;

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const options: LoggerOptions = {
    name: config.name ?? 'deck-progress-report',
    level: config.level ?? 'info',
  };

  if (config.pretty === true) {
    return pinoLib({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, ignore: 'pid,hostname,name', destination: STDERR_FD },
      },
    });
  }

  return pinoLib(options, pinoLib.destination({ dest: STDERR_FD, sync: true }));
};

export { type Logger } from 'pino';
