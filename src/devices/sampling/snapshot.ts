/**
 * Device Snapshot
 *
 * The complete published state of one backend. Snapshots are immutable:
 * each cycle builds a new one on local maps and publishes it whole.
 */

import type { MemoryInfo } from '../types/memory-info.js';

export interface DeviceSnapshot {
  /** Monotonic publication counter, 0 for the empty snapshot */
  readonly sequence: number;
  /** When the cycle that produced this snapshot finished */
  readonly takenAt: Date;
  readonly temperatures: ReadonlyMap<string, number>;
  readonly memory: ReadonlyMap<string, Readonly<MemoryInfo>>;
  readonly usage: ReadonlyMap<string, number>;
  /** Every device discovered in the cycle, including ones whose reads all failed */
  readonly devices: ReadonlySet<string>;
  /** Device label (or the backend key) to the last error in the cycle */
  readonly errors: ReadonlyMap<string, Error>;
}

export const EMPTY_SNAPSHOT: DeviceSnapshot = Object.freeze({
  sequence: 0,
  takenAt: new Date(0),
  temperatures: new Map<string, number>(),
  memory: new Map<string, MemoryInfo>(),
  usage: new Map<string, number>(),
  devices: new Set<string>(),
  errors: new Map<string, Error>(),
});

/**
 * Collects one cycle's readings. Nothing here is visible to readers until
 * build() hands the result to the cache.
 */
export class SnapshotBuilder {
  private readonly temperatures = new Map<string, number>();
  private readonly memory = new Map<string, MemoryInfo>();
  private readonly usage = new Map<string, number>();
  private readonly errors = new Map<string, Error>();
  private readonly devices = new Set<string>();

  /** Marks a device as discovered this cycle, even if every read fails */
  addDevice(label: string): this {
    this.devices.add(label);
    return this;
  }

  setTemperature(label: string, celsius: number): this {
    this.devices.add(label);
    this.temperatures.set(label, celsius);
    return this;
  }

  setMemory(label: string, info: MemoryInfo): this {
    this.devices.add(label);
    this.memory.set(label, { ...info });
    return this;
  }

  setUsage(label: string, percent: number): this {
    this.devices.add(label);
    this.usage.set(label, percent);
    return this;
  }

  recordError(key: string, error: Error): this {
    this.errors.set(key, error);
    return this;
  }

  build(sequence: number, takenAt: Date = new Date()): DeviceSnapshot {
    return Object.freeze({
      sequence,
      takenAt,
      temperatures: new Map(this.temperatures),
      memory: new Map(this.memory),
      usage: new Map(this.usage),
      devices: new Set(this.devices),
      errors: new Map(this.errors),
    });
  }
}
