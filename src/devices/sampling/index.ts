/**
 * Device Sampling
 *
 * Periodic sampling tasks and the snapshot caches they publish to.
 */

export * from './snapshot.js';
export * from './snapshot-cache.js';
export * from './backend-sampler.js';
export * from './providers.js';
export * from './launch.js';
