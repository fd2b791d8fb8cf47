/**
 * GPU ID Resolution
 */

export * from './gpu-ids.js';
