/**
 * Device Probe
 */

export * from './probe.js';
