/**
 * System Dashboard
 *
 * Samples local hardware metrics on a fixed cadence, keeps a rolling
 * temperature history and redraws a terminal dashboard every tick.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './samplers/index.js';
export * from './history/index.js';
export * from './thresholds/index.js';
export * from './config/index.js';
export * from './renderer/index.js';
export * from './refresh-loop/index.js';
export * from './sources.js';
export * from './snapshot-builder.js';
export * from './dashboard.js';
