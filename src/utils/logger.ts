import winston from 'winston';
import { getConfig } from '../config/index.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Several processes may log to one terminal; every line carries the writer's pid
const logFormat = printf(({ level, message, timestamp, component, pid, ...metadata }) => {
  const componentStr = component ? `[${String(component)}]` : '';
  const metaStr = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${String(timestamp)} ${level} ${String(pid)} ${componentStr} ${String(message)}${metaStr}`;
});

let base: winston.Logger | null = null;

/**
 * Process-wide winston logger; file transports are attached to it
 */
export function baseLogger(): winston.Logger {
  if (!base) {
    const config = getConfig();
    base = winston.createLogger({
      level: config.logLevel,
      // Keep test output readable; failures still surface through assertions
      silent: config.env === 'test',
      defaultMeta: { pid: process.pid },
      format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
      transports: [
        new winston.transports.Console({
          format: combine(colorize({ all: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), logFormat),
        }),
      ],
      exitOnError: false,
    });
  }
  return base;
}

export type Logger = Pick<winston.Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Logger tagged with a component name
 */
export function logger(component: string): Logger {
  return baseLogger().child({ component });
}

/**
 * Shorten an address for log lines
 */
export function shortAddress(address: string): string {
  return address.length > 12 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;
}
