import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatBytesExact,
  formatBytesGb,
  formatPercent,
  formatTemperature,
  formatTimestamp,
} from './format.js';

describe('Formatting', () => {
  it('should format sizes in 1024-based units', () => {
    expect(formatBytes(512)).toBe('512.0 B');
    expect(formatBytes(1024)).toBe('1.0 KB');
    expect(formatBytes(1536 * 1024)).toBe('1.5 MB');
    expect(formatBytes(4 * 1024 ** 3)).toBe('4.0 GB');
  });

  it('should format exact byte counts with separators', () => {
    expect(formatBytesExact(1048576)).toBe('1,048,576');
  });

  it('should format whole gibibytes', () => {
    expect(formatBytesGb(100 * 1024 ** 3)).toBe('100G');
  });

  it('should print N/A for absent percentages and temperatures', () => {
    expect(formatPercent(null)).toBe('N/A');
    expect(formatTemperature(null)).toBe('N/A');
  });

  it('should format percentages and temperatures', () => {
    expect(formatPercent(42.34)).toBe('42.3%');
    expect(formatPercent(7, 0)).toBe('7%');
    expect(formatPercent(0)).toBe('0.0%');
    expect(formatTemperature(65)).toBe('65°C');
    expect(formatTemperature(65.44)).toBe('65.4°C');
  });

  it('should format local timestamps', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
  });
});
