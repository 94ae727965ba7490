/**
 * DashboardConfig Interface
 *
 * Effective configuration after validation. Loaded once at startup and
 * frozen for the rest of the run.
 */

import type { ForegroundColorName } from 'chalk';

export interface TemperatureThresholds {
  /** Values at or above this are shown as a warning (Celsius) */
  warning: number;
  /** Values at or above this are shown as critical (Celsius) */
  critical: number;
}

export interface DisplayOptions {
  showGpu: boolean;
  showNetwork: boolean;
  /** Rows in each temperature graph */
  graphHeight: number;
  /** Maximum samples drawn per graph row */
  graphLength: number;
}

/** Named terminal colors used for each severity tier */
export interface ColorOptions {
  normal: ForegroundColorName;
  warning: ForegroundColorName;
  critical: ForegroundColorName;
}

export interface MountFilterOptions {
  excludeVirtualFilesystems: boolean;
  excludeLoopDevices: boolean;
  excludeSnapMounts: boolean;
}

export interface DashboardConfig {
  /** Seconds between tick starts */
  refreshRate: number;
  maxHistoryPoints: number;
  temperatureThresholds: TemperatureThresholds;
  display: DisplayOptions;
  colors: ColorOptions;
  filters: MountFilterOptions;
  /** Deadline for a single external command, in seconds */
  samplerTimeout: number;
  gpu: {
    /** Seconds before a missing GPU tool is probed again; 0 caches the result for the whole run */
    reprobeInterval: number;
  };
}
