import pino from 'pino';

export type LogFn = (message: string, ...args: unknown[]) => void;

/** printf-style sink shared by every component; `error` is for failures only. */
export interface Logger {
  log: LogFn;
  error: LogFn;
}

export interface CreateLoggerOptions {
  level?: pino.LevelWithSilent;
  pretty?: boolean;
}

export function createLogger(name: string, options: CreateLoggerOptions = {}): Logger {
  const instance = pino({
    name,
    level: options.level ?? 'info',
    ...(options.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
              translateTime: 'HH:MM:ss',
            },
          },
        }
      : {}),
  });

  return {
    log: (message, ...args) => instance.info(message, ...args),
    error: (message, ...args) => instance.error(message, ...args),
  };
}
