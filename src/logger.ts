import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  service?: string;
  level?: string;
  /** Pretty console output via pino-pretty instead of JSON lines. */
  pretty?: boolean;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const { service = 'fedirelay', level = 'info', pretty = false } = config;

  const options: LoggerOptions = {
    level,
    base: { service },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: {
          destination: 1,
          colorize: true,
          translateTime: 'SYS:standard',
          messageFormat: '[{module}] {msg}',
          ignore: 'pid,hostname,service',
        },
      }),
    );
  }

  return pino(options, process.stdout);
}

export function createChildLogger(parent: Logger, name: string): Logger {
  return parent.child({ module: name });
}
