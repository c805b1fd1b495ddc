import winston from 'winston';
import { getClientConfig } from '../config';

const { logLevel } = getClientConfig();

export const logger = winston.createLogger({
  level: logLevel === 'silent' ? 'error' : logLevel,
  silent: logLevel === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => `${timestamp} [${level}] ${message}`),
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});
