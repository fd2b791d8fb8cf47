/**
 * Sysfs Access
 */

export * from './sysfs-reader.js';
