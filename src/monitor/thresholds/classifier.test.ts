import { describe, it, expect } from 'vitest';
import { classify, isOrderedThresholds, percentSeverity, severityRank } from './classifier.js';

describe('classify', () => {
  const thresholds = { warning: 70, critical: 80 };

  it.each([
    [80, 'critical'],
    [95, 'critical'],
    [79.9, 'warning'],
    [70, 'warning'],
    [69.9, 'normal'],
    [-5, 'normal'],
  ] as const)('should classify %s as %s', (value, expected) => {
    expect(classify(value, thresholds)).toBe(expected);
  });

  it('should classify an absent value as unknown', () => {
    expect(classify(null, thresholds)).toBe('unknown');
    expect(classify(NaN, thresholds)).toBe('unknown');
  });
});

describe('percentSeverity', () => {
  it('should use the fixed 50/75 utilization tiers', () => {
    expect(percentSeverity(49.9)).toBe('normal');
    expect(percentSeverity(50)).toBe('warning');
    expect(percentSeverity(75)).toBe('critical');
    expect(percentSeverity(null)).toBe('unknown');
  });
});

describe('severityRank', () => {
  it('should order normal below warning below critical', () => {
    expect(severityRank('normal')).toBe(0);
    expect(severityRank('warning')).toBe(1);
    expect(severityRank('critical')).toBe(2);
  });

  it('should not rank unknown', () => {
    expect(severityRank('unknown')).toBeNull();
  });
});

describe('isOrderedThresholds', () => {
  it('should accept warning below critical', () => {
    expect(isOrderedThresholds({ warning: 70, critical: 80 })).toBe(true);
  });

  it('should reject equal or inverted pairs', () => {
    expect(isOrderedThresholds({ warning: 80, critical: 80 })).toBe(false);
    expect(isOrderedThresholds({ warning: 85, critical: 80 })).toBe(false);
  });
});
