/**
 * Device Registry
 */

export * from './registry.js';
