/**
 * Dashboard Configuration Loader
 *
 * Reads the JSON config once at startup. Every field is validated on its
 * own: a missing key takes its default silently, an invalid one takes its
 * default with a warning, and unknown keys are ignored. Nothing here fails
 * startup.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { foregroundColorNames, type ForegroundColorName } from 'chalk';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ConfigInvalidError, toErrorMessage } from '../errors.js';
import { isOrderedThresholds } from '../thresholds/classifier.js';
import type { DashboardConfig } from '../types/index.js';

const log = createSubsystemLogger('monitor/config');

export const DEFAULT_CONFIG: DashboardConfig = deepFreeze<DashboardConfig>({
  refreshRate: 1.0,
  maxHistoryPoints: 100,
  temperatureThresholds: {
    warning: 70,
    critical: 80,
  },
  display: {
    showGpu: true,
    showNetwork: false,
    graphHeight: 8,
    graphLength: 100,
  },
  colors: {
    normal: 'green',
    warning: 'yellow',
    critical: 'red',
  },
  filters: {
    excludeVirtualFilesystems: true,
    excludeLoopDevices: true,
    excludeSnapMounts: true,
  },
  samplerTimeout: 2,
  gpu: {
    reprobeInterval: 0,
  },
});

/**
 * On-disk shape (snake_case keys, every key optional)
 */
export interface RawDashboardConfig {
  refresh_rate?: unknown;
  max_history_points?: unknown;
  temperature_thresholds?: { warning?: unknown; critical?: unknown };
  display?: { show_gpu?: unknown; show_network?: unknown; graph_height?: unknown; graph_length?: unknown };
  colors?: { normal?: unknown; warning?: unknown; critical?: unknown };
  filters?: {
    exclude_virtual_filesystems?: unknown;
    exclude_loop_devices?: unknown;
    exclude_snap_mounts?: unknown;
  };
  sampler_timeout?: unknown;
  gpu?: { reprobe_interval?: unknown };
}

export interface LoadedConfig {
  config: DashboardConfig;
  warnings: string[];
  /** Where the effective values came from */
  source: 'file' | 'defaults';
  path: string;
}

interface FieldRule<T> {
  /** Shown in the warning as "expected ..." */
  expected: string;
  accepts(value: unknown): value is T;
}

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

/** Longest delay a Node timer takes, in whole seconds (2^31 - 1 ms) */
export const MAX_TIMER_SECONDS = 2_147_483;

const timerSeconds: FieldRule<number> = {
  expected: `a number greater than 0 and at most ${MAX_TIMER_SECONDS}`,
  accepts: (value): value is number => isFiniteNumber(value) && value > 0 && value <= MAX_TIMER_SECONDS,
};

const positiveInteger: FieldRule<number> = {
  expected: 'a whole number greater than 0',
  accepts: (value): value is number => Number.isInteger(value) && isFiniteNumber(value) && value > 0,
};

const nonNegativeNumber: FieldRule<number> = {
  expected: 'a number of at least 0',
  accepts: (value): value is number => isFiniteNumber(value) && value >= 0,
};

const finiteNumber: FieldRule<number> = {
  expected: 'a number',
  accepts: isFiniteNumber,
};

const flag: FieldRule<boolean> = {
  expected: 'true or false',
  accepts: (value): value is boolean => typeof value === 'boolean',
};

const colorNames: ReadonlySet<string> = new Set(foregroundColorNames);

const colorName: FieldRule<ForegroundColorName> = {
  expected: 'a color name such as "green" or "redBright"',
  accepts: (value): value is ForegroundColorName => typeof value === 'string' && colorNames.has(value),
};

function describeValue(value: unknown): string {
  return typeof value === 'number' ? String(value) : JSON.stringify(value) ?? String(value);
}

export function defaultConfigPath(): string {
  const configHome = process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(configHome, 'system-monitor', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getPath(raw: unknown, path: string): unknown {
  let current = raw;
  for (const key of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

const SECTIONS = ['temperature_thresholds', 'display', 'colors', 'filters', 'gpu'] as const;

function field<T>(raw: unknown, path: string, rule: FieldRule<T>, fallback: T, warnings: string[]): T {
  const value = getPath(raw, path);
  if (value === undefined) {
    return fallback;
  }
  if (rule.accepts(value)) {
    return value;
  }

  const reason = `expected ${rule.expected}, got ${describeValue(value)}`;
  warnings.push(new ConfigInvalidError(path, `${reason}; using default ${JSON.stringify(fallback)}`).message);
  return fallback;
}

/**
 * Validates a parsed config document into effective values
 */
export function resolveDashboardConfig(raw: unknown): { config: DashboardConfig; warnings: string[] } {
  const warnings: string[] = [];
  const d = DEFAULT_CONFIG;

  if (raw !== undefined && !isRecord(raw)) {
    warnings.push(new ConfigInvalidError('<root>', 'expected a JSON object; using defaults').message);
    return { config: DEFAULT_CONFIG, warnings };
  }

  for (const section of SECTIONS) {
    const value = getPath(raw, section);
    if (value !== undefined && !isRecord(value)) {
      warnings.push(
        new ConfigInvalidError(section, `expected an object, got ${describeValue(value)}; using defaults`).message,
      );
    }
  }

  let temperatureThresholds = {
    warning: field(raw, 'temperature_thresholds.warning', finiteNumber, d.temperatureThresholds.warning, warnings),
    critical: field(raw, 'temperature_thresholds.critical', finiteNumber, d.temperatureThresholds.critical, warnings),
  };

  if (!isOrderedThresholds(temperatureThresholds)) {
    warnings.push(
      new ConfigInvalidError(
        'temperature_thresholds',
        `warning (${temperatureThresholds.warning}) must be below critical (${temperatureThresholds.critical}); using defaults`,
      ).message,
    );
    temperatureThresholds = { ...d.temperatureThresholds };
  }

  const config: DashboardConfig = {
    refreshRate: field(raw, 'refresh_rate', timerSeconds, d.refreshRate, warnings),
    maxHistoryPoints: field(raw, 'max_history_points', positiveInteger, d.maxHistoryPoints, warnings),
    temperatureThresholds,
    display: {
      showGpu: field(raw, 'display.show_gpu', flag, d.display.showGpu, warnings),
      showNetwork: field(raw, 'display.show_network', flag, d.display.showNetwork, warnings),
      graphHeight: field(raw, 'display.graph_height', positiveInteger, d.display.graphHeight, warnings),
      graphLength: field(raw, 'display.graph_length', positiveInteger, d.display.graphLength, warnings),
    },
    colors: {
      normal: field(raw, 'colors.normal', colorName, d.colors.normal, warnings),
      warning: field(raw, 'colors.warning', colorName, d.colors.warning, warnings),
      critical: field(raw, 'colors.critical', colorName, d.colors.critical, warnings),
    },
    filters: {
      excludeVirtualFilesystems: field(
        raw,
        'filters.exclude_virtual_filesystems',
        flag,
        d.filters.excludeVirtualFilesystems,
        warnings,
      ),
      excludeLoopDevices: field(raw, 'filters.exclude_loop_devices', flag, d.filters.excludeLoopDevices, warnings),
      excludeSnapMounts: field(raw, 'filters.exclude_snap_mounts', flag, d.filters.excludeSnapMounts, warnings),
    },
    samplerTimeout: field(raw, 'sampler_timeout', timerSeconds, d.samplerTimeout, warnings),
    gpu: {
      reprobeInterval: field(raw, 'gpu.reprobe_interval', nonNegativeNumber, d.gpu.reprobeInterval, warnings),
    },
  };

  return { config: deepFreeze(config), warnings };
}

/**
 * Loads the config file, falling back to defaults when it is missing or
 * unreadable. Warnings are logged as well as returned.
 */
export function loadDashboardConfig(path: string = defaultConfigPath()): LoadedConfig {
  if (!existsSync(path)) {
    log.debug('No config file, using defaults', { path });
    return { config: DEFAULT_CONFIG, warnings: [], source: 'defaults', path };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const warning = `Could not load config file ${path}: ${toErrorMessage(error)}; using defaults`;
    log.warn(warning);
    return { config: DEFAULT_CONFIG, warnings: [warning], source: 'defaults', path };
  }

  const { config, warnings } = resolveDashboardConfig(raw);
  for (const warning of warnings) {
    log.warn(warning, { path });
  }

  log.info('Configuration loaded', { path, refreshRate: config.refreshRate, maxHistoryPoints: config.maxHistoryPoints });
  return { config, warnings, source: 'file', path };
}

export function toRawConfig(config: DashboardConfig): RawDashboardConfig {
  return {
    refresh_rate: config.refreshRate,
    max_history_points: config.maxHistoryPoints,
    temperature_thresholds: { ...config.temperatureThresholds },
    display: {
      show_gpu: config.display.showGpu,
      show_network: config.display.showNetwork,
      graph_height: config.display.graphHeight,
      graph_length: config.display.graphLength,
    },
    colors: { ...config.colors },
    filters: {
      exclude_virtual_filesystems: config.filters.excludeVirtualFilesystems,
      exclude_loop_devices: config.filters.excludeLoopDevices,
      exclude_snap_mounts: config.filters.excludeSnapMounts,
    },
    sampler_timeout: config.samplerTimeout,
    gpu: { reprobe_interval: config.gpu.reprobeInterval },
  };
}

/**
 * Writes the config as pretty JSON, creating parent directories
 */
export function saveDashboardConfig(path: string, config: DashboardConfig): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(toRawConfig(config), null, 2)}\n`, 'utf8');
  log.info('Configuration saved', { path });
}

/**
 * Layers overrides (same on-disk shape) over an effective config and
 * validates the result again.
 */
export function applyConfigOverrides(
  config: DashboardConfig,
  overrides: RawDashboardConfig,
): { config: DashboardConfig; warnings: string[] } {
  return resolveDashboardConfig(deepMerge(toRawConfig(config), overrides));
}

function deepMerge(base: object, overrides: object): Record<string, unknown> {
  const merged: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
