import winston from 'winston';

export type LogFormat = 'text' | 'json';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: buildFormat(process.env.LOG_FORMAT === 'json' ? 'json' : 'text'),
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
});

/**
 * Child logger tagged with the module that owns it
 */
export function createLogger(scope: string): winston.Logger {
  return logger.child({ scope });
}

export function configureLogger(options: { level?: string; format?: LogFormat; silent?: boolean }): void {
  if (options.level) {
    logger.level = options.level;
  }
  if (options.format) {
    logger.format = buildFormat(options.format);
  }
  if (options.silent !== undefined) {
    logger.silent = options.silent;
  }
}

function buildFormat(format: LogFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }

  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, scope, ...meta }) => {
      const tag = typeof scope === 'string' ? ` [${scope}]` : '';
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} ${level}${tag}: ${String(message)}${extra}`;
    })
  );
}

export type { Logger } from 'winston';
