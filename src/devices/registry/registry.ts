/**
 * Device Registry
 *
 * Backend-agnostic registry of startup functions and provider callbacks.
 * Backends register a startup function; during bring-up each startup decides
 * whether its hardware is present and, if so, registers the providers the
 * rendering layer pulls merged results from.
 */

import { createSubsystemLogger, formatError } from '../../logging/subsystem.js';
import { DeviceStartupError, toError } from '../errors.js';
import type { DeviceVars } from '../types/device-vars.js';
import type { MemoryInfo } from '../types/memory-info.js';
import type {
  DeviceErrors,
  MemoryProvider,
  StartupFunction,
  TemperatureProvider,
  UsageProvider,
} from '../types/providers.js';

const log = createSubsystemLogger('devices/registry');

export interface RegistryCounts {
  startups: number;
  temperature: number;
  memory: number;
  usage: number;
}

export class DeviceRegistry {
  private readonly startups: StartupFunction[] = [];
  private readonly temperatureProviders: TemperatureProvider[] = [];
  private readonly memoryProviders: MemoryProvider[] = [];
  private readonly usageProviders: UsageProvider[] = [];
  private readonly abortController = new AbortController();
  private started = false;

  /** Aborted by shutdown(); sampling loops stop when it fires */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  registerStartup(fn: StartupFunction): void {
    this.startups.push(fn);
  }

  registerTemp(fn: TemperatureProvider): void {
    this.temperatureProviders.push(fn);
  }

  registerMem(fn: MemoryProvider): void {
    this.memoryProviders.push(fn);
  }

  registerCpu(fn: UsageProvider): void {
    this.usageProviders.push(fn);
  }

  /**
   * Runs every startup function once, in registration order. Failures are
   * collected while the remaining backends still start, then raised together.
   */
  async startup(vars: DeviceVars): Promise<void> {
    if (this.started) {
      throw new DeviceStartupError('registry', 'device startup already ran');
    }
    this.started = true;

    const failures: Error[] = [];
    for (const startup of this.startups) {
      try {
        await startup(vars, this);
      } catch (error) {
        const failure = toError(error);
        log.error('Device backend failed to start', { error: failure.message });
        failures.push(failure);
      }
    }

    log.info('Device startup completed', { ...this.counts(), failures: failures.length });

    if (failures.length > 0) {
      throw new DeviceStartupError(
        'registry',
        `device startup failed: ${failures.map((failure) => failure.message).join('; ')}`,
        { errors: failures },
      );
    }
  }

  /**
   * Pulls temperatures from every backend into `out`
   */
  updateTemperatures(out: Map<string, number>): DeviceErrors {
    return this.collect(this.temperatureProviders, (provider) => provider(out));
  }

  /**
   * Pulls memory figures from every backend into `out`
   */
  updateMemory(out: Map<string, MemoryInfo>): DeviceErrors {
    return this.collect(this.memoryProviders, (provider) => provider(out));
  }

  /**
   * Pulls utilization from every backend into `out`
   */
  updateUsage(out: Map<string, number>, logical: boolean): DeviceErrors {
    return this.collect(this.usageProviders, (provider) => provider(out, logical));
  }

  counts(): RegistryCounts {
    return {
      startups: this.startups.length,
      temperature: this.temperatureProviders.length,
      memory: this.memoryProviders.length,
      usage: this.usageProviders.length,
    };
  }

  isShutdown(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Stops every sampling loop bound to this registry
   */
  shutdown(): void {
    if (this.abortController.signal.aborted) {
      return;
    }
    log.debug('Shutting down device sampling');
    this.abortController.abort();
  }

  private collect<P>(providers: readonly P[], invoke: (provider: P) => DeviceErrors): DeviceErrors {
    const errors: DeviceErrors = new Map();
    for (const provider of providers) {
      try {
        for (const [key, error] of invoke(provider)) {
          errors.set(key, error);
        }
      } catch (error) {
        log.warn('Device provider threw', { error: formatError(error) });
        errors.set('registry', toError(error));
      }
    }
    return errors;
  }
}

/** Process-wide registry used by the free registration functions */
export const defaultRegistry = new DeviceRegistry();

export function registerStartup(fn: StartupFunction): void {
  defaultRegistry.registerStartup(fn);
}

export function registerTemp(fn: TemperatureProvider): void {
  defaultRegistry.registerTemp(fn);
}

export function registerMem(fn: MemoryProvider): void {
  defaultRegistry.registerMem(fn);
}

export function registerCpu(fn: UsageProvider): void {
  defaultRegistry.registerCpu(fn);
}
