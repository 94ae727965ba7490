/**
 * Metric Samplers
 *
 * One MetricSource per hardware or OS metric. Sources share no state and
 * may be sampled concurrently.
 */

export * from './command-runner.js';
export * from './metric-source.js';
export * from './cpu-usage.js';
export * from './cpu-temperature.js';
export * from './gpu.js';
export * from './memory.js';
export * from './mount-filter.js';
export * from './disk.js';
export * from './network.js';
