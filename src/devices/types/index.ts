/**
 * Device Telemetry - Type Definitions
 */

export * from './memory-info.js';
export * from './device-vars.js';
export * from './providers.js';
