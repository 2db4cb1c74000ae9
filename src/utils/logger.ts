import winston from 'winston';
import { config } from '../config';
import { bigIntReplacer } from './serialization';

const { combine, timestamp, errors, json, printf, colorize } = winston.format;

// Console lines: "<time> [<level>]: <message>" followed by any metadata
const consoleFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  if (stack) {
    msg += `\n${stack}`;
  }

  if (Object.keys(metadata).length > 0) {
    msg += `\n${JSON.stringify(metadata, bigIntReplacer, 2)}`;
  }

  return msg;
});

const isTest = config.server.nodeEnv === 'test';

export const logger = winston.createLogger({
  level: config.server.logLevel,
  silent: isTest,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    json({ replacer: bigIntReplacer })
  ),
  defaultMeta: {
    service: 'feed-registry',
    version: '1.0.0'
  },
  transports: isTest ? [new winston.transports.Console()] : [
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error'
    }),
    new winston.transports.File({
      filename: 'logs/combined.log'
    })
  ]
});

if (config.server.nodeEnv !== 'production' && !isTest) {
  logger.add(new winston.transports.Console({
    format: combine(
      colorize(),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      errors({ stack: true }),
      consoleFormat
    )
  }));
}

export default logger;
