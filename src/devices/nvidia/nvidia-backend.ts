/**
 * NVIDIA GPU Backend
 *
 * Opt-in (`nvidia=true`) backend over nvidia-smi. Reports temperature,
 * memory and utilization; a field the driver does not expose is recorded
 * as a read error for that device.
 */

import { createSubsystemLogger, formatError } from '../../logging/subsystem.js';
import { DeviceReadError, DeviceStartupError } from '../errors.js';
import { readRefreshInterval, readToggle } from '../config/device-config.js';
import { launchBackendSampler } from '../sampling/launch.js';
import { ordinalLabel, uniqueLabels } from '../naming/labels.js';
import { NvidiaSmiQuery, type NvidiaGpuReading, type NvidiaQuery } from './nvidia-smi.js';
import type { BackendSampler } from '../sampling/backend-sampler.js';
import type { SnapshotBuilder } from '../sampling/snapshot.js';
import type { DeviceRegistry } from '../registry/registry.js';
import type { DeviceVars } from '../types/device-vars.js';
import type { MetricKind } from '../types/providers.js';

const log = createSubsystemLogger('devices/nvidia');

export const NVIDIA_BACKEND = 'nvidia';
export const NVIDIA_REFRESH_KEY = 'nvidia-refresh';

export interface NvidiaBackendOptions {
  query?: NvidiaQuery;
}

export class NvidiaBackend {
  private readonly query: NvidiaQuery;
  private sampler?: BackendSampler;

  constructor(options: NvidiaBackendOptions = {}) {
    this.query = options.query ?? new NvidiaSmiQuery();
  }

  getSampler(): BackendSampler | undefined {
    return this.sampler;
  }

  async start(vars: DeviceVars, registry: DeviceRegistry): Promise<void> {
    if (readToggle(vars, [NVIDIA_BACKEND]) !== 'enabled') {
      return;
    }

    const intervalMs = readRefreshInterval(vars, NVIDIA_REFRESH_KEY);

    let readings: NvidiaGpuReading[];
    try {
      readings = await this.query.query();
    } catch (error) {
      throw new DeviceStartupError(NVIDIA_BACKEND, `NVIDIA GPU error: ${formatError(error)}`, { cause: error });
    }
    if (readings.length === 0) {
      throw new DeviceStartupError(NVIDIA_BACKEND, 'NVIDIA GPU error: no NVIDIA GPUs found');
    }

    this.sampler = await launchBackendSampler(registry, {
      backend: NVIDIA_BACKEND,
      intervalMs,
      kinds: ['temperature', 'memory', 'usage'],
      cycle: (builder) => this.sample(builder),
    });

    log.info('NVIDIA backend started', { gpus: readings.length, intervalMs });
  }

  async sample(builder: SnapshotBuilder): Promise<void> {
    const readings = await this.query.query();
    if (readings.length === 0) {
      builder.recordError(NVIDIA_BACKEND, new Error('NVIDIA GPU error: no NVIDIA GPUs found'));
      return;
    }
    const labels = uniqueLabels(readings.map((reading) => ordinalLabel(reading.name, reading.index)));
    readings.forEach((reading, position) => {
      recordReading(builder, labels[position] ?? reading.name, reading);
    });
  }
}

function missing(label: string, metric: MetricKind): DeviceReadError {
  return new DeviceReadError(NVIDIA_BACKEND, label, metric, `NVIDIA GPU error: ${metric} not reported for ${label}`);
}

function recordReading(builder: SnapshotBuilder, label: string, reading: NvidiaGpuReading): void {
  builder.addDevice(label);

  if (reading.temperature !== undefined) {
    builder.setTemperature(label, Math.round(reading.temperature));
  } else {
    builder.recordError(label, missing(label, 'temperature'));
  }

  if (reading.utilization !== undefined) {
    builder.setUsage(label, Math.round(reading.utilization));
  } else {
    builder.recordError(label, missing(label, 'usage'));
  }

  const { totalMemory, usedMemory } = reading;
  if (totalMemory !== undefined && usedMemory !== undefined && totalMemory > 0) {
    builder.setMemory(label, {
      total: totalMemory,
      used: usedMemory,
      usedPercent: (usedMemory / totalMemory) * 100,
    });
  } else {
    builder.recordError(label, missing(label, 'memory'));
  }
}

export function registerNvidiaBackend(registry: DeviceRegistry, options: NvidiaBackendOptions = {}): NvidiaBackend {
  const backend = new NvidiaBackend(options);
  registry.registerStartup((vars, target) => backend.start(vars, target));
  return backend;
}
