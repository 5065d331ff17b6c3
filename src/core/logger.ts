import winston from 'winston';
import { config } from './config';

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.logging.silent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'goal-chain' },
  transports: [
    new winston.transports.Console({
      format: config.server.env === 'production'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ],
});
