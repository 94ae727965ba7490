/**
 * Threshold Classifier
 *
 * Maps a value onto a severity tier. Tiers are inclusive at their lower
 * edge: a value equal to `warning` is a warning and a value equal to
 * `critical` is critical. An absent value is `unknown` and ranks nowhere.
 */

import type { TemperatureThresholds } from '../types/index.js';

export type Severity = 'normal' | 'warning' | 'critical' | 'unknown';

export type Thresholds = TemperatureThresholds;

/** Utilization percentages (CPU, memory, disk, GPU) */
export const PERCENT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({ warning: 50, critical: 75 });

const SEVERITY_RANK: Record<Exclude<Severity, 'unknown'>, number> = {
  normal: 0,
  warning: 1,
  critical: 2,
};

export function classify(value: number | null, thresholds: Thresholds): Severity {
  if (value === null || Number.isNaN(value)) {
    return 'unknown';
  }
  if (value >= thresholds.critical) {
    return 'critical';
  }
  if (value >= thresholds.warning) {
    return 'warning';
  }
  return 'normal';
}

/**
 * Position in normal < warning < critical, or null for `unknown`
 */
export function severityRank(severity: Severity): number | null {
  return severity === 'unknown' ? null : SEVERITY_RANK[severity];
}

export function percentSeverity(percent: number | null): Severity {
  return classify(percent, PERCENT_THRESHOLDS);
}

/**
 * True when the pair can produce all three tiers
 */
export function isOrderedThresholds(thresholds: Thresholds): boolean {
  return Number.isFinite(thresholds.warning) &&
    Number.isFinite(thresholds.critical) &&
    thresholds.warning < thresholds.critical;
}
