import winston from 'winston';
import { config } from './config';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'sso-gateway' },
  transports: [new winston.transports.Console()],
});

export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
