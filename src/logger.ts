import winston from 'winston';

const levels = Object.keys(winston.config.npm.levels);

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ level, message, timestamp }) => `[${String(timestamp)}] ${level}: ${String(message)}`)
);

/**
 * Everything goes to stderr so card data and usage text on stdout stay clean.
 * `LOG_FORMAT=json` switches to one JSON object per line for batch runs.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  transports: [new winston.transports.Console({ stderrLevels: levels })],
  format:
    process.env.LOG_FORMAT === 'json'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : lineFormat,
});
