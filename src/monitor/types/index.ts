/**
 * System Dashboard - Type Definitions
 */

export * from './reading.js';
export * from './metrics.js';
export * from './dashboard-config.js';
export * from './snapshot.js';
