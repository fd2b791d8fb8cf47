/**
 * Snapshot Cache
 *
 * Holds exactly one live snapshot per backend. The sampling task is the only
 * writer and swaps in complete snapshots; provider callbacks copy out of
 * whichever snapshot is live when they run. Both sides are synchronous, so a
 * reader always sees one whole cycle.
 */

import { EMPTY_SNAPSHOT, type DeviceSnapshot } from './snapshot.js';
import type { MemoryInfo } from '../types/memory-info.js';
import type { DeviceErrors } from '../types/providers.js';

export class SnapshotCache {
  readonly backend: string;
  private snapshot: DeviceSnapshot = EMPTY_SNAPSHOT;

  constructor(backend: string) {
    this.backend = backend;
  }

  current(): DeviceSnapshot {
    return this.snapshot;
  }

  nextSequence(): number {
    return this.snapshot.sequence + 1;
  }

  publish(next: DeviceSnapshot): void {
    this.snapshot = next;
  }

  /**
   * Publishes the previous metrics again with `error` recorded under `key`.
   * Used when discovery fails outright so last-known-good data stays visible.
   */
  retainWithError(key: string, error: Error, takenAt: Date = new Date()): DeviceSnapshot {
    const previous = this.snapshot;
    const errors = new Map(previous.errors);
    errors.set(key, error);
    const next: DeviceSnapshot = Object.freeze({
      sequence: previous.sequence + 1,
      takenAt,
      temperatures: previous.temperatures,
      memory: previous.memory,
      usage: previous.usage,
      devices: previous.devices,
      errors,
    });
    this.snapshot = next;
    return next;
  }

  copyTemperatures(out: Map<string, number>): DeviceErrors {
    const { temperatures, errors } = this.snapshot;
    for (const [label, celsius] of temperatures) {
      out.set(label, celsius);
    }
    return new Map(errors);
  }

  copyMemory(out: Map<string, MemoryInfo>): DeviceErrors {
    const { memory, errors } = this.snapshot;
    for (const [label, info] of memory) {
      out.set(label, { ...info });
    }
    return new Map(errors);
  }

  copyUsage(out: Map<string, number>): DeviceErrors {
    const { usage, errors } = this.snapshot;
    for (const [label, percent] of usage) {
      out.set(label, percent);
    }
    return new Map(errors);
  }
}
