/**
 * NVIDIA GPU Backend
 */

export * from './nvidia-smi.js';
export * from './nvidia-backend.js';
