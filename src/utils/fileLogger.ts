/**
 * File Logger
 *
 * Adds JSON file transports to the base logger so runs can be audited after the fact.
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { baseLogger, logger } from './logger.js';

const log = logger('FileLogger');

const MAX_FILE_SIZE_BYTES = 20 * 1024 * 1024;
const MAX_FILES = 7;

/**
 * JSON format for file logging
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Initialize file logging transports
 */
export function initializeFileLogging(directory: string): string {
  const logDir = path.resolve(directory);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const base = baseLogger();

  // Everything, plus a separate errors-only file
  base.add(
    new winston.transports.File({
      dirname: logDir,
      filename: 'replication.log',
      format: jsonFormat,
      maxsize: MAX_FILE_SIZE_BYTES,
      maxFiles: MAX_FILES,
    })
  );
  base.add(
    new winston.transports.File({
      dirname: logDir,
      filename: 'error.log',
      level: 'error',
      format: jsonFormat,
      maxsize: MAX_FILE_SIZE_BYTES,
      maxFiles: MAX_FILES,
    })
  );

  log.info('File logging initialized', { directory: logDir });
  return logDir;
}
