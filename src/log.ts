import pino, { type Logger, type LoggerOptions } from 'pino';
import { isTestEnv } from './config/index.js';

export type { Logger };

export function createLogger(opts: { level?: string; pretty?: boolean } = {}): Logger {
  const options: LoggerOptions = {
    base: undefined,
    enabled: !isTestEnv(),
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  };
  if (!opts.pretty) return pino(options);
  const transport = pino.transport({
    target: 'pino-pretty',
    options: {
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
      colorize: false,
      ignore: 'pid,hostname',
    },
  });
  return pino(options, transport);
}

export const log = createLogger();

export function withScope(logger: Logger, scope: string): Logger {
  return logger.child({ scope });
}
