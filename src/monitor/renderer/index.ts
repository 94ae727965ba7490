/**
 * Dashboard Rendering
 */

export * from './format.js';
export * from './palette.js';
export * from './layout.js';
export * from './temperature-graph.js';
export * from './panels.js';
export * from './renderer.js';
export * from './terminal-writer.js';
export * from './blessed-surface.js';
