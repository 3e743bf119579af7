import winston from 'winston';
import fs from 'fs';
import config from '../config';

/**
 * Shared winston logger. Console output goes to stderr so the CLI keeps stdout for JSON.
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  }),
];

// File transports only when LOG_TO_FILES=true
if (config.logging.toFiles) {
  if (!fs.existsSync('logs')) {
    fs.mkdirSync('logs');
  }
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
    }),
  );
}

const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'metar-decoder' },
  transports,
});

export default logger;
