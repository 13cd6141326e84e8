import winston from 'winston';

const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Shared logger for the client. Level comes from PVE_LOG_LEVEL (default: info)
 */
export const logger: winston.Logger = winston.createLogger({
  level: process.env.PVE_LOG_LEVEL || 'info',
  format: logFormat,
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      silent: process.env.NODE_ENV === 'test'
    })
  ]
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
