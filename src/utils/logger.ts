import winston from 'winston';
import fs from 'fs';
import config from '../config';

/**
 * Console logging, plus JSON files under logs/ when LOG_TO_FILES is set
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
  }),
];

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
  defaultMeta: { service: 'flight-endpoint-guesser' },
  transports,
});

export default logger;
