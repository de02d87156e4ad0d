import winston from 'winston';
import { env } from '../config/env';

const isProduction = env.NODE_ENV === 'production';

// Ledger events carry their own structured metadata (sessionId, operation...)
export const logger = winston.createLogger({
  level: env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction ? winston.format.json() : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'honeypot-ledger' },
  silent: env.NODE_ENV === 'test',
  transports: [new winston.transports.Console()],
});
