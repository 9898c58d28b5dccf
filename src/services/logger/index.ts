import { join } from 'node:path';
import { appConfig } from '@config/app.ts';
import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger, TransportTargetOptions } from 'pino';

/**
 * Log levels type
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Logger type for dependency injection
 */
export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory receiving the rotating run log */
  reportsDir?: string;
  /** Write JSON lines here instead of the configured transports */
  destination?: DestinationStream;
}

/**
 * Create a logger
 *
 * Development: pretty console output plus a daily rotating file in reports/.
 * Production: JSON to stdout plus the same rotating file.
 * Test: silent unless a destination is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? appConfig.logLevel;

  if (options.destination) {
    return pino(
      {
        level,
        formatters: {
          level: (label) => {
            return { level: label };
          },
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      options.destination
    );
  }

  if (appConfig.isTest) {
    return pino({ level: 'silent' });
  }

  const reportsDir = options.reportsDir ?? appConfig.paths.reportsDir;

  const consoleTarget: TransportTargetOptions = appConfig.isProduction
    ? { target: 'pino/file', level, options: { destination: 1 } }
    : {
        target: 'pino-pretty',
        level,
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      };

  const rotatingFile: TransportTargetOptions = {
    target: 'pino-roll',
    level,
    options: {
      file: join(reportsDir, appConfig.logFile.name),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      extension: '.log',
      mkdir: true,
      limit: { count: appConfig.logFile.retentionDays },
    },
  };

  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: { targets: [consoleTarget, rotatingFile] },
  });
}

/**
 * Structured logging helpers bound to a logger
 */
export function createLogHelpers(target: Logger) {
  return {
    /**
     * Log a session lifecycle event
     */
    session: (data: { event: 'started' | 'finished'; details?: Record<string, unknown> }) => {
      target.info(
        { type: 'session', event: data.event, ...data.details },
        data.event === 'started' ? 'Starting test session' : 'Test session finished'
      );
    },

    /**
     * Log a test outcome, one line per test
     */
    test: (data: {
      testId: string;
      category: string;
      phase: string;
      result: 'passed' | 'failed' | 'skipped';
      durationMs: number;
      reason?: string;
      error?: { name: string; message: string };
      screenshot?: string;
    }) => {
      const logData = {
        type: 'test',
        testId: data.testId,
        category: data.category,
        phase: data.phase,
        result: data.result,
        durationMs: data.durationMs,
        ...(data.reason ? { reason: data.reason } : {}),
        ...(data.error ? { error: `${data.error.name}: ${data.error.message}` } : {}),
        ...(data.screenshot ? { screenshot: data.screenshot } : {}),
      };

      if (data.result === 'failed') {
        target.error(logData, `Test failed: ${data.testId}`);
      } else if (data.result === 'passed') {
        target.info(logData, `Test passed: ${data.testId}`);
      } else {
        target.info(logData, `Test skipped: ${data.testId}`);
      }
    },

    /**
     * Log an outgoing API request and its response
     */
    api: (data: {
      method: string;
      url: string;
      statusCode: number;
      duration: number;
      body?: string;
    }) => {
      const logData = {
        type: 'api',
        method: data.method,
        url: data.url,
        statusCode: data.statusCode,
        durationMs: data.duration,
      };

      target.info(logData, `API Response: ${data.statusCode}`);
      if (data.body !== undefined) {
        target.debug({ ...logData, body: data.body.slice(0, 500) }, 'Response body');
      }
    },
  };
}

export type LogHelpers = ReturnType<typeof createLogHelpers>;
