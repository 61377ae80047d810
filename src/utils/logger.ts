import winston from 'winston';

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: 'energy-portal-session' },
    transports: [
      new winston.transports.Console({
        silent: process.env.NODE_ENV === 'test',
      }),
    ],
  });
}

export const logger = createLogger();

/**
 * Shortens a secret for log output.
 */
export function redact(value: string, visible = 6): string {
  if (value.length <= visible) return '***';
  return `${value.slice(0, visible)}...`;
}
