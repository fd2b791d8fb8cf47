/**
 * Device Naming
 */

export * from './labels.js';
