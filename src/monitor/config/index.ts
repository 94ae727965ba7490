export * from './config-loader.js';
