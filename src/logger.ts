import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** pino level, `silent` disables output */
  level?: string;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Bound to every line as `component` */
  component?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', pretty = false, component } = options;

  const logger = pino({
    level,
    ...(pretty ? {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    } : {}),
  });

  return component ? logger.child({ component }) : logger;
}

/**
 * Logger that writes nothing, the default for library use
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
