import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { AppConfig } from '../config';

export const getLogsDir = (logDir: string): string => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  return logDir;
};

/**
 * One logger per process. `processName` ends up on every entry so that lines
 * from sibling workers sharing the log files can be told apart.
 */
export const createLogger = (
  config: Pick<AppConfig, 'logDir' | 'logLevel'>,
  processName: string
): winston.Logger => {
  const logDir = getLogsDir(config.logDir);

  return winston.createLogger({
    level: config.logLevel,
    defaultMeta: { process: processName },
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      }),
      new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
      new winston.transports.File({ filename: path.join(logDir, 'combined.log') }),
    ],
  });
};

export type Logger = winston.Logger;
