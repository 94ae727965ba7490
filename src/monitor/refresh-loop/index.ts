export * from './refresh-loop.js';
