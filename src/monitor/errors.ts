/**
 * Dashboard Error Taxonomy
 *
 * Only TerminalRenderFailure is fatal. Every other error is recovered where
 * it happens and shown as a neutral placeholder.
 */

import type { FailureTag } from './types/index.js';

export type DashboardErrorCode =
  | 'CONFIG_INVALID'
  | 'SENSOR_UNAVAILABLE'
  | 'TOOL_MISSING'
  | 'TOOL_FAILED'
  | 'PARSE_ERROR'
  | 'TERMINAL_RENDER_FAILURE';

export class DashboardError extends Error {
  constructor(
    message: string,
    public readonly code: DashboardErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DashboardError';
  }
}

export class ConfigInvalidError extends DashboardError {
  constructor(path: string, reason: string) {
    super(`Invalid config value at ${path}: ${reason}`, 'CONFIG_INVALID', { path, reason });
    this.name = 'ConfigInvalidError';
  }
}

export class SensorUnavailableError extends DashboardError {
  constructor(sensor: string, reason: string) {
    super(`Sensor unavailable: ${sensor} (${reason})`, 'SENSOR_UNAVAILABLE', { sensor, reason });
    this.name = 'SensorUnavailableError';
  }
}

export class ToolMissingError extends DashboardError {
  constructor(tool: string, cause?: unknown) {
    super(`Tool not found: ${tool}`, 'TOOL_MISSING', { tool }, { cause });
    this.name = 'ToolMissingError';
  }
}

export class ToolFailedError extends DashboardError {
  constructor(tool: string, exitCode: number, stderr: string) {
    super(`${tool} exited with code ${exitCode}`, 'TOOL_FAILED', { tool, exitCode, stderr });
    this.name = 'ToolFailedError';
  }
}

export class ParseError extends DashboardError {
  constructor(source: string, reason: string) {
    super(`Could not parse ${source}: ${reason}`, 'PARSE_ERROR', { source, reason });
    this.name = 'ParseError';
  }
}

export class TerminalRenderFailure extends DashboardError {
  constructor(reason: string, cause?: unknown) {
    super(`Terminal render failure: ${reason}`, 'TERMINAL_RENDER_FAILURE', { reason }, { cause });
    this.name = 'TerminalRenderFailure';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Maps any thrown value to the failure tag a sampler reports.
 */
export function failureTagFor(error: unknown): FailureTag {
  if (error instanceof ParseError) {
    return 'parse_error';
  }
  if (error instanceof ToolMissingError || error instanceof SensorUnavailableError) {
    return 'unavailable';
  }
  return 'tool_error';
}
