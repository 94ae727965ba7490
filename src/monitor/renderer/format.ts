/**
 * Value formatting for the dashboard. Absent values always print as "N/A",
 * never as zero.
 */

export const NOT_AVAILABLE = 'N/A';

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * 1024-based human readable size, e.g. "1.0 KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (Math.abs(value) < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}

/**
 * Exact byte count with thousands separators, e.g. "1,048,576"
 */
export function formatBytesExact(bytes: number): string {
  return Math.round(bytes).toLocaleString('en-US');
}

/**
 * Whole gibibytes with a G suffix, as df -h prints them
 */
export function formatBytesGb(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(0)}G`;
}

export function formatPercent(value: number | null, digits = 1): string {
  return value === null ? NOT_AVAILABLE : `${value.toFixed(digits)}%`;
}

export function formatTemperature(celsius: number | null): string {
  if (celsius === null) {
    return NOT_AVAILABLE;
  }
  return Number.isInteger(celsius) ? `${celsius}°C` : `${celsius.toFixed(1)}°C`;
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
