import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  // falseならJSON行で出力（cron等でログを収集する場合）
  pretty?: boolean;
}

let loggerInstance: pino.Logger | null = null;

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  if (loggerInstance) {
    return loggerInstance;
  }

  const { level = 'info', pretty = true } = options;

  loggerInstance = pretty
    ? pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino({ level });

  return loggerInstance;
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    return createLogger();
  }
  return loggerInstance;
}

export type Logger = pino.Logger;
