/**
 * Built-in Backends
 *
 * Registers every backend this package ships with a registry, in the order
 * their startups run.
 */

import { registerAmdBackend, type AmdBackend, type AmdBackendOptions } from './amd/amd-backend.js';
import { registerAppleBackend, type AppleBackend, type AppleBackendOptions } from './apple/apple-backend.js';
import { registerNvidiaBackend, type NvidiaBackend, type NvidiaBackendOptions } from './nvidia/nvidia-backend.js';
import type { DeviceRegistry } from './registry/registry.js';

export interface BuiltinBackendOptions {
  amd?: AmdBackendOptions;
  apple?: AppleBackendOptions;
  nvidia?: NvidiaBackendOptions;
}

export interface BuiltinBackends {
  amd: AmdBackend;
  apple: AppleBackend;
  nvidia: NvidiaBackend;
}

export function registerBuiltinBackends(registry: DeviceRegistry, options: BuiltinBackendOptions = {}): BuiltinBackends {
  return {
    amd: registerAmdBackend(registry, options.amd),
    apple: registerAppleBackend(registry, options.apple),
    nvidia: registerNvidiaBackend(registry, options.nvidia),
  };
}
