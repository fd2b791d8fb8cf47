export * from './devices/index.js';
export {
  createSubsystemLogger,
  formatError,
  getLogLevel,
  setLogLevel,
  type LogLevel,
  type SubsystemLogger,
} from './logging/subsystem.js';
export * from './probe/index.js';
