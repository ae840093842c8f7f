import pino, { Logger } from 'pino';

// The node:test runner marks its worker processes with NODE_TEST_CONTEXT
const isTest = process.env.NODE_ENV === 'test' || process.env.NODE_TEST_CONTEXT !== undefined;
const isDev = process.env.NODE_ENV !== 'production' && !isTest;

// Configure pino transport
const transport = isDev
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }
  : undefined;

// Create base logger
export const logger = pino({
  level: process.env.LOG_LEVEL?.toLowerCase() || (isTest ? 'silent' : 'info'),
  transport,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'lookalike-scanner',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.apiKey', '*.token', '*.secret', '*.authorization', '*["x-api-key"]'],
    censor: '[REDACTED]',
  },
});

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Fields bound to every line logged while a scan runs
 */
export interface ScanLogContext {
  scanId: string;
  strategy?: string;
  target?: string;
}

export function createScanLogger(module: string, context: ScanLogContext): Logger {
  return logger.child({ module, ...context });
}

export type { Logger };
