// packages/playlist-backend/src/infrastructure/logger.ts

// Pino-based JSON logger with a minimal typed wrapper.
// - Container-friendly (stdout JSON); pretty printing in development only.
// - Child loggers carry jobId/stage bindings.
// - Caller credentials never reach the log stream.

import pino from 'pino';

import type { StageName } from '@vibelist/contracts';

export interface LogFields {
  jobId?: string;
  stage?: StageName;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const REDACTED_PATHS = [
  'accessToken',
  'request.accessToken',
  'job.request.accessToken',
  'authorization',
  'headers.authorization',
];

// logger.declaration()
export const logger: Logger = createRootLogger();

function createRootLogger(): Logger {
  const base = pino({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
  });

  return wrapPino(base);
}

export function wrapPino(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrapPino(instance.child(bindings));
    },
  };
}

export function createJobLogger(jobId: string, stage?: StageName): Logger {
  return stage ? logger.child({ jobId, stage }) : logger.child({ jobId });
}
