/**
 * Backend Sampler
 *
 * One periodic sampling task per enabled backend. Each cycle rediscovers
 * devices and rereads metrics into a local builder, then publishes the
 * result to the backend's cache in a single swap. A cycle that throws is a
 * discovery failure: the previous metrics stay published and the error is
 * recorded under the backend's own key.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, formatError, type SubsystemLogger } from '../../logging/subsystem.js';
import { toError } from '../errors.js';
import { SnapshotBuilder, type DeviceSnapshot } from './snapshot.js';
import { SnapshotCache } from './snapshot-cache.js';
import { DEFAULT_REFRESH_MS } from '../config/device-config.js';

export type SampleCycle = (builder: SnapshotBuilder) => Promise<void>;

export type SamplerState = 'disabled' | 'initializing' | 'running' | 'stopped';

export interface BackendSamplerOptions {
  /** Backend key; discovery failures are recorded under it */
  backend: string;
  /** Fills one cycle's readings; throwing means enumeration failed */
  cycle: SampleCycle;
  /** Milliseconds between cycles */
  intervalMs?: number;
  cache?: SnapshotCache;
}

interface SamplerEvents {
  sample: [DeviceSnapshot];
  sampleError: [Error];
  tickSkipped: [number];
  stateChanged: [SamplerState];
}

export class BackendSampler extends EventEmitter<SamplerEvents> {
  readonly backend: string;
  readonly intervalMs: number;
  readonly cache: SnapshotCache;
  private readonly cycle: SampleCycle;
  private readonly logger: SubsystemLogger;
  private state: SamplerState = 'disabled';
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private skippedTicks = 0;
  private abortListener?: { signal: AbortSignal; listener: () => void };

  constructor(options: BackendSamplerOptions) {
    super();
    this.backend = options.backend;
    this.cycle = options.cycle;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_MS;
    this.cache = options.cache ?? new SnapshotCache(options.backend);
    this.logger = createSubsystemLogger(`devices/${options.backend}/sampler`);
  }

  getState(): SamplerState {
    return this.state;
  }

  getSkippedTicks(): number {
    return this.skippedTicks;
  }

  /**
   * Takes an immediate sample, then samples every `intervalMs` until the
   * signal aborts or stop() is called
   */
  async start(signal?: AbortSignal): Promise<DeviceSnapshot> {
    if (this.state !== 'disabled') {
      throw new Error(`${this.backend} sampler already ${this.state}`);
    }
    this.setState('initializing');

    const first = await this.sampleOnce();

    if (signal?.aborted) {
      this.stop();
      return first;
    }

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();

    if (signal) {
      const listener = (): void => this.stop();
      signal.addEventListener('abort', listener, { once: true });
      this.abortListener = { signal, listener };
    }

    this.setState('running');
    this.logger.debug('Sampling started', { intervalMs: this.intervalMs });
    return first;
  }

  /**
   * Runs one full cycle and publishes its result. Cycle failures are recorded
   * in the cache; only a throwing event listener rejects.
   */
  async sampleOnce(): Promise<DeviceSnapshot> {
    const builder = new SnapshotBuilder();
    try {
      await this.cycle(builder);
    } catch (error) {
      const failure = toError(error);
      const retained = this.cache.retainWithError(this.backend, failure);
      this.logger.debug('Sampling cycle failed, keeping previous metrics', { error: failure.message });
      this.emit('sampleError', failure);
      return retained;
    }

    const snapshot = builder.build(this.cache.nextSequence());
    this.cache.publish(snapshot);
    this.emit('sample', snapshot);
    return snapshot;
  }

  /**
   * Stops the periodic task. A cycle already in flight still publishes.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.abortListener) {
      this.abortListener.signal.removeEventListener('abort', this.abortListener.listener);
      this.abortListener = undefined;
    }
    if (this.state !== 'stopped') {
      this.setState('stopped');
      this.logger.debug('Sampling stopped');
    }
  }

  /**
   * Resolves once the cycle in flight (if any) has published
   */
  async settle(): Promise<void> {
    await this.inFlight;
  }

  private tick(): void {
    if (this.inFlight) {
      // a slow read stalls only this backend; ticks are dropped, not queued
      this.skippedTicks++;
      this.emit('tickSkipped', this.skippedTicks);
      return;
    }
    this.inFlight = this.sampleOnce()
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.warn('Sampling listener failed', { error: formatError(error) });
        },
      )
      .finally(() => {
        this.inFlight = undefined;
      });
  }

  private setState(state: SamplerState): void {
    this.state = state;
    this.emit('stateChanged', state);
  }
}
