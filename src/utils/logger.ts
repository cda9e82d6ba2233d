import fs from 'fs';
import winston from 'winston';
import { config } from '../config';

// Clean terminal output: "12:00:01 info: message key=value"
const cleanFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let formattedMessage = String(message);

    if (Object.keys(meta).length > 0) {
      const metaStr = Object.entries(meta)
        .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
        .join(' ');
      formattedMessage += ` ${metaStr}`;
    }

    return `${timestamp} ${level}: ${formattedMessage}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    // CLI report goes to stdout, so logs go to stderr
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }),
];

if (config.LOG_TO_FILE) {
  if (!fs.existsSync('logs')) {
    fs.mkdirSync('logs');
  }
  transports.push(
    new winston.transports.File({
      filename: 'logs/phishy-checker.log',
      level: 'debug',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );
}

export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  format: cleanFormat,
  transports,
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

export function shortAddress(address: string): string {
  return address.length > 12 ? `${address.substring(0, 6)}...${address.slice(-4)}` : address;
}
