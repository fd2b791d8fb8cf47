/**
 * Backend Launch
 *
 * Shared tail of every backend startup: create the cache and sampler,
 * register the providers, take the first sample and hand the periodic task
 * to the registry's lifetime.
 */

import { BackendSampler, type SampleCycle } from './backend-sampler.js';
import { SnapshotCache } from './snapshot-cache.js';
import { registerBackendProviders } from './providers.js';
import type { DeviceRegistry } from '../registry/registry.js';
import type { MetricKind } from '../types/providers.js';

export interface LaunchOptions {
  backend: string;
  intervalMs: number;
  cycle: SampleCycle;
  kinds: readonly MetricKind[];
}

export async function launchBackendSampler(registry: DeviceRegistry, options: LaunchOptions): Promise<BackendSampler> {
  const cache = new SnapshotCache(options.backend);
  const sampler = new BackendSampler({
    backend: options.backend,
    cycle: options.cycle,
    intervalMs: options.intervalMs,
    cache,
  });
  registerBackendProviders(registry, cache, options.kinds);
  await sampler.start(registry.signal);
  return sampler;
}
