/**
 * Subsystem Logging
 *
 * Every module gets a named pino child logger. All of them share one
 * destination so the dashboard can move log records off the terminal while
 * it owns the screen.
 */

import { appendFileSync } from 'node:fs';
import pino from 'pino';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface SubsystemLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;
}

export type LogOutput =
  | { kind: 'stderr' }
  | { kind: 'file'; path: string }
  | { kind: 'discard' };

let output: LogOutput = { kind: 'stderr' };
let outputFailure: string | undefined;

// A log write must never fail the caller: on error, logging stops and the
// failure is kept for the CLI to report once the screen is released.
const destination: pino.DestinationStream = {
  write(line: string) {
    try {
      if (output.kind === 'file') {
        appendFileSync(output.path, line, 'utf8');
      } else if (output.kind === 'stderr') {
        process.stderr.write(line);
      }
    } catch (error) {
      const target = output.kind === 'file' ? output.path : output.kind;
      outputFailure = `${target}: ${error instanceof Error ? error.message : String(error)}`;
      output = { kind: 'discard' };
    }
  },
};

const rootLogger = pino(
  {
    level: parseLevel(process.env.SYSDASH_LOG_LEVEL) ?? 'info',
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
  },
  destination,
);

// Child loggers copy their level when created; setLogLevel updates them all
const children = new Set<pino.Logger>();

export function parseLevel(value: string | undefined): LogLevelName | undefined {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return normalized;
    default:
      return undefined;
  }
}

/**
 * Redirects every subsystem logger. Used by the CLI while the dashboard is
 * drawing so that records never interleave with the frame.
 */
export function setLogOutput(next: LogOutput): void {
  output = next;
  outputFailure = undefined;
}

/**
 * Why log output was switched off, if a write to it has failed since the
 * last setLogOutput
 */
export function getLogOutputFailure(): string | undefined {
  return outputFailure;
}

export function setLogLevel(level: LogLevelName): void {
  rootLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.child({ subsystem });
  children.add(logger);

  const write = (level: LogLevelName) => (message: string, meta?: Record<string, unknown>) => {
    if (meta === undefined) {
      logger[level](message);
    } else {
      logger[level](meta, message);
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
  };
}
