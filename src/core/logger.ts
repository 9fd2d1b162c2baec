import pino, { type Logger } from 'pino';
import { env } from './env.js';

// Determine environment
const isDev = !env.isProduction && !env.isTest;

// stdout carries the report, so every log line goes to stderr
const STDERR_FD = 2;

const options: pino.LoggerOptions = {
  level: env.LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'lookalike-scan',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.apiKey', '*.token', '*.secret'],
    censor: '[REDACTED]',
  },
};

// Create base logger
export const logger: Logger = isDev
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service',
          singleLine: true,
          destination: STDERR_FD,
        },
      },
    })
  : pino(options, pino.destination(STDERR_FD));

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
