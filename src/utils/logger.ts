/**
 * Structured logging utility using pino
 *
 * - Environment-based log levels
 * - Colourised pretty printing on stderr (stdout carries reports)
 * - Component-based context
 */

import pino from 'pino';
import { sanitizeForLogging } from './sanitize.js';
import { config } from '../config/index.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const logLevel = config.logging.debug ? 'debug' : config.logging.level;

/**
 * Pino serializer that sanitizes sensitive data
 */
const sanitizingSerializer = (obj: unknown) => sanitizeForLogging(obj);

const pinoOptions: pino.LoggerOptions = {
  level: logLevel,
  enabled: !isTest,
  redact: {
    paths: ['token', 'password', 'authorization', '*.token', '*.password', '*.authorization'],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: sanitizingSerializer,
    command: sanitizingSerializer,
  },
};

// Reports go to stdout, so every log line goes to stderr (fd 2)
// No transport worker under the test runner, where logging is disabled anyway
export const logger = pino({
  ...pinoOptions,
  transport: isTest ? undefined : {
    target: 'pino-pretty',
    options: {
      destination: 2,
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname,component',
      messageFormat: '{if repo}[{repo}] {end}{msg}',
    },
  },
});

// Children copy the level when created, so a later change has to reach them too
const componentLoggers: pino.Logger[] = [];

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'github', 'executor', 'cleanup')
 */
export function createComponentLogger(component: string): pino.Logger {
  const child = logger.child({ component });
  componentLoggers.push(child);
  return child;
}

/**
 * Change the level of the root logger and every component logger (--quiet)
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}
