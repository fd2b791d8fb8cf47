/**
 * AMD GPU Backend
 *
 * Auto-detects AMD GPUs through sysfs. `amd=true` (or `amdgpu=true`) makes a
 * missing GPU a startup failure; `amd=false` skips the backend entirely;
 * otherwise the backend enables itself only when GPUs are found.
 */

import { createSubsystemLogger, formatError } from '../../logging/subsystem.js';
import { DeviceReadError, DeviceStartupError, toError } from '../errors.js';
import { readRefreshInterval, readToggle } from '../config/device-config.js';
import { SysfsReader } from '../sysfs/sysfs-reader.js';
import { defaultGpuIdResolver, type GpuIdResolver } from '../ids/gpu-ids.js';
import { launchBackendSampler } from '../sampling/launch.js';
import {
  AMD_BACKEND,
  AMDGPU_DRIVER_PATH,
  DRM_CLASS_PATH,
  discoverAmdGpus,
  type AmdGpu,
} from './amd-discovery.js';
import { readAmdBusy, readAmdTemperature, readAmdVram } from './amd-metrics.js';
import type { BackendSampler } from '../sampling/backend-sampler.js';
import type { SnapshotBuilder } from '../sampling/snapshot.js';
import type { DeviceRegistry } from '../registry/registry.js';
import type { DeviceVars } from '../types/device-vars.js';
import type { MetricKind } from '../types/providers.js';

const log = createSubsystemLogger('devices/amd');

export const AMD_TOGGLE_KEYS: readonly string[] = ['amd', 'amdgpu'];
export const AMD_REFRESH_KEY = 'amd-refresh';

const CHECKED_PATHS = `check ${DRM_CLASS_PATH} and ${AMDGPU_DRIVER_PATH}`;

export interface AmdBackendOptions {
  sysfs?: SysfsReader;
  resolver?: GpuIdResolver;
}

export class AmdBackend {
  private readonly sysfs: SysfsReader;
  private readonly resolver: GpuIdResolver;
  private sampler?: BackendSampler;

  constructor(options: AmdBackendOptions = {}) {
    this.sysfs = options.sysfs ?? new SysfsReader();
    this.resolver = options.resolver ?? defaultGpuIdResolver;
  }

  /** The running sampler, once startup enabled the backend */
  getSampler(): BackendSampler | undefined {
    return this.sampler;
  }

  /**
   * Startup function: decides enablement, registers providers and launches
   * the sampling loop
   */
  async start(vars: DeviceVars, registry: DeviceRegistry): Promise<void> {
    const toggle = readToggle(vars, AMD_TOGGLE_KEYS);
    if (toggle === 'disabled') {
      log.debug('AMD backend disabled by configuration');
      return;
    }
    const forced = toggle === 'enabled';

    let gpus: AmdGpu[];
    try {
      gpus = await this.discover();
    } catch (error) {
      if (forced) {
        throw new DeviceStartupError(AMD_BACKEND, `AMD GPU error: ${formatError(error)} (${CHECKED_PATHS})`, { cause: error });
      }
      log.debug('AMD discovery failed, backend stays inactive', { error: formatError(error) });
      return;
    }

    if (gpus.length === 0) {
      if (forced) {
        throw new DeviceStartupError(AMD_BACKEND, `AMD GPU error: no AMD GPUs found (${CHECKED_PATHS})`);
      }
      log.debug('No AMD GPUs detected, backend stays inactive');
      return;
    }

    const intervalMs = readRefreshInterval(vars, AMD_REFRESH_KEY);
    const kinds: MetricKind[] = ['temperature', 'memory', 'usage'];
    this.sampler = await launchBackendSampler(registry, {
      backend: AMD_BACKEND,
      intervalMs,
      kinds,
      cycle: (builder) => this.sample(builder),
    });

    log.info('AMD backend started', {
      gpus: gpus.map((gpu) => gpu.label),
      intervalMs,
      autoDetected: !forced,
    });
  }

  discover(): Promise<AmdGpu[]> {
    return discoverAmdGpus({ sysfs: this.sysfs, resolver: this.resolver });
  }

  /**
   * One sampling cycle. Discovery errors propagate so the sampler keeps the
   * previous snapshot; read errors are recorded per device.
   */
  async sample(builder: SnapshotBuilder): Promise<void> {
    const gpus = await this.discover();
    if (gpus.length === 0) {
      builder.recordError(AMD_BACKEND, new Error(`AMD GPU error: no AMD GPUs found (${CHECKED_PATHS})`));
      return;
    }
    await Promise.all(gpus.map((gpu) => this.sampleGpu(gpu, builder)));
  }

  private async sampleGpu(gpu: AmdGpu, builder: SnapshotBuilder): Promise<void> {
    builder.addDevice(gpu.label);
    const [temperature, busy, vram] = await Promise.allSettled([
      readAmdTemperature(this.sysfs, gpu.devicePath),
      readAmdBusy(this.sysfs, gpu.devicePath),
      readAmdVram(this.sysfs, gpu.devicePath),
    ]);

    if (temperature.status === 'fulfilled') {
      builder.setTemperature(gpu.label, temperature.value);
    } else {
      builder.recordError(gpu.label, readError(gpu.label, 'temperature', temperature.reason));
    }

    if (busy.status === 'fulfilled') {
      builder.setUsage(gpu.label, busy.value);
    } else {
      builder.recordError(gpu.label, readError(gpu.label, 'usage', busy.reason));
    }

    if (vram.status === 'fulfilled') {
      builder.setMemory(gpu.label, vram.value);
    } else {
      builder.recordError(gpu.label, readError(gpu.label, 'memory', vram.reason));
    }
  }
}

function readError(label: string, metric: MetricKind, reason: unknown): DeviceReadError {
  const cause = toError(reason);
  return new DeviceReadError(AMD_BACKEND, label, metric, `AMD GPU error: ${metric} read failed for ${label}: ${cause.message}`, { cause });
}

/**
 * Registers an AMD backend's startup with a registry
 */
export function registerAmdBackend(registry: DeviceRegistry, options: AmdBackendOptions = {}): AmdBackend {
  const backend = new AmdBackend(options);
  registry.registerStartup((vars, target) => backend.start(vars, target));
  return backend;
}
