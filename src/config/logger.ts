import winston from 'winston';
import { config } from './index';

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${rest}`;
  })
);

export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: config.appName },
  format:
    config.env === 'production'
      ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
      : devFormat,
  transports: [new winston.transports.Console()],
  silent: config.env === 'test',
});
