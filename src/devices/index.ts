/**
 * Device Telemetry
 *
 * Backend registration, discovery and cached sampling of accelerator
 * metrics for terminal dashboards.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config/index.js';
export * from './registry/index.js';
export * from './ids/index.js';
export * from './naming/index.js';
export * from './sysfs/index.js';
export * from './sampling/index.js';
export * from './amd/index.js';
export * from './apple/index.js';
export * from './nvidia/index.js';
export * from './backends.js';
