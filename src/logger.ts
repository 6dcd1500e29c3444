import pino, { Logger } from 'pino';
import { AppConfig, LogLevel } from './types';

interface LoggerOptions {
  level?: LogLevel;
  command?: string;
}

export function createLogger(config: AppConfig, options: LoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;
  const pretty = process.stdout.isTTY;
  const base = { site: config.site, command: options.command };

  if (pretty) {
    return pino({
      level,
      base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level,
    base,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
