export * from './monitor/index.js';
export { createSubsystemLogger, setLogOutput, setLogLevel, type SubsystemLogger, type LogOutput } from './logging/subsystem.js';
