/**
 * Apple GPU Backend
 */

export * from './gpu-query.js';
export * from './ioreg-query.js';
export * from './apple-backend.js';
