/**
 * Device Configuration
 */

export * from './device-config.js';
