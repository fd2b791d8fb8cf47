/**
 * Apple GPU Backend
 *
 * Unified-memory GPUs on macOS. Opt-in only (`apple=true`); reports memory
 * and utilization, no temperature.
 */

import { createSubsystemLogger, formatError } from '../../logging/subsystem.js';
import { DeviceReadError, DeviceStartupError } from '../errors.js';
import { readRefreshInterval, readToggle } from '../config/device-config.js';
import { launchBackendSampler } from '../sampling/launch.js';
import { ordinalLabel } from '../naming/labels.js';
import { readGpuDevices, type GpuDeviceReading, type GpuQuery } from './gpu-query.js';
import { IoregGpuQuery } from './ioreg-query.js';
import type { BackendSampler } from '../sampling/backend-sampler.js';
import type { SnapshotBuilder } from '../sampling/snapshot.js';
import type { DeviceRegistry } from '../registry/registry.js';
import type { DeviceVars } from '../types/device-vars.js';

const log = createSubsystemLogger('devices/apple');

export const APPLE_BACKEND = 'apple';
export const APPLE_REFRESH_KEY = 'apple-refresh';

export interface AppleBackendOptions {
  query?: GpuQuery;
  platform?: NodeJS.Platform;
}

export class AppleBackend {
  private readonly query: GpuQuery;
  private readonly platform: NodeJS.Platform;
  private sampler?: BackendSampler;

  constructor(options: AppleBackendOptions = {}) {
    this.query = options.query ?? new IoregGpuQuery();
    this.platform = options.platform ?? process.platform;
  }

  getSampler(): BackendSampler | undefined {
    return this.sampler;
  }

  async start(vars: DeviceVars, registry: DeviceRegistry): Promise<void> {
    if (readToggle(vars, [APPLE_BACKEND]) !== 'enabled') {
      return;
    }
    if (this.platform !== 'darwin') {
      throw new DeviceStartupError(APPLE_BACKEND, `Apple GPU error: not supported on ${this.platform}`);
    }

    const intervalMs = readRefreshInterval(vars, APPLE_REFRESH_KEY);

    let devices: GpuDeviceReading[];
    try {
      devices = await readGpuDevices(this.query);
    } catch (error) {
      throw new DeviceStartupError(APPLE_BACKEND, `Apple GPU error: ${formatError(error)}`, { cause: error });
    }
    if (devices.length === 0) {
      throw new DeviceStartupError(APPLE_BACKEND, 'Apple GPU error: no Apple GPUs found');
    }

    this.sampler = await launchBackendSampler(registry, {
      backend: APPLE_BACKEND,
      intervalMs,
      kinds: ['memory', 'usage'],
      cycle: (builder) => this.sample(builder),
    });

    log.info('Apple backend started', { gpus: devices.map((device) => device.name), intervalMs });
  }

  /**
   * One sampling cycle; a failed query propagates so previous metrics stay
   * published
   */
  async sample(builder: SnapshotBuilder): Promise<void> {
    const devices = await readGpuDevices(this.query);
    if (devices.length === 0) {
      builder.recordError(APPLE_BACKEND, new Error('Apple GPU error: no Apple GPUs found'));
      return;
    }
    devices.forEach((device, index) => recordReading(builder, device, index));
  }
}

function recordReading(builder: SnapshotBuilder, device: GpuDeviceReading, index: number): void {
  const label = ordinalLabel(device.name, index);
  builder.addDevice(label);
  builder.setUsage(label, device.utilization >= 0 ? device.utilization : 0);

  if (device.totalMemory > 0) {
    builder.setMemory(label, {
      total: device.totalMemory,
      used: device.usedMemory,
      usedPercent: (device.usedMemory / device.totalMemory) * 100,
    });
  } else {
    builder.recordError(
      label,
      new DeviceReadError(APPLE_BACKEND, label, 'memory', `Apple GPU error: total memory unavailable for ${label}`),
    );
  }
}

export function registerAppleBackend(registry: DeviceRegistry, options: AppleBackendOptions = {}): AppleBackend {
  const backend = new AppleBackend(options);
  registry.registerStartup((vars, target) => backend.start(vars, target));
  return backend;
}
