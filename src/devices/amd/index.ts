/**
 * AMD GPU Backend
 */

export * from './amd-discovery.js';
export * from './amd-metrics.js';
export * from './amd-backend.js';
