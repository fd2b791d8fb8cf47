/**
 * Snapshot Providers
 *
 * Adapts a backend's snapshot cache to the provider callback contracts.
 */

import type { SnapshotCache } from './snapshot-cache.js';
import type { DeviceRegistry } from '../registry/registry.js';
import type { MemoryProvider, MetricKind, TemperatureProvider, UsageProvider } from '../types/providers.js';

export interface BackendProviders {
  temperature: TemperatureProvider;
  memory: MemoryProvider;
  usage: UsageProvider;
}

export function createBackendProviders(cache: SnapshotCache): BackendProviders {
  return {
    temperature: (out) => cache.copyTemperatures(out),
    memory: (out) => cache.copyMemory(out),
    usage: (out) => cache.copyUsage(out),
  };
}

/**
 * Registers the providers for the metric kinds a backend reports
 */
export function registerBackendProviders(
  registry: DeviceRegistry,
  cache: SnapshotCache,
  kinds: readonly MetricKind[],
): BackendProviders {
  const providers = createBackendProviders(cache);
  if (kinds.includes('temperature')) {
    registry.registerTemp(providers.temperature);
  }
  if (kinds.includes('memory')) {
    registry.registerMem(providers.memory);
  }
  if (kinds.includes('usage')) {
    registry.registerCpu(providers.usage);
  }
  return providers;
}
