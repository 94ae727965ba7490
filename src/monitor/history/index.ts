/**
 * Temperature History
 */

export * from './history-ring.js';
export * from './history-store.js';
