/**
 * Device Telemetry Errors
 *
 * Startup errors are fatal only for force-enabled backends; discovery and
 * per-device read errors travel through provider error mappings.
 */

import type { MetricKind } from './types/providers.js';

export class DeviceError extends Error {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceError';
    this.backend = backend;
  }
}

export class DeviceStartupError extends DeviceError {
  /** Underlying failures when several backends failed in one bring-up */
  readonly errors: readonly Error[];

  constructor(backend: string, message: string, options?: { cause?: unknown; errors?: readonly Error[] }) {
    super(backend, message, options);
    this.name = 'DeviceStartupError';
    this.errors = options?.errors ?? [];
  }
}

export class DiscoveryError extends DeviceError {
  readonly path?: string;

  constructor(backend: string, message: string, options?: { cause?: unknown; path?: string }) {
    super(backend, message, options);
    this.name = 'DiscoveryError';
    this.path = options?.path;
  }
}

export class DeviceReadError extends DeviceError {
  readonly device: string;
  readonly metric: MetricKind;

  constructor(backend: string, device: string, metric: MetricKind, message: string, options?: { cause?: unknown }) {
    super(backend, message, options);
    this.name = 'DeviceReadError';
    this.device = device;
    this.metric = metric;
  }
}

export class ResolverUnavailableError extends DeviceError {
  readonly paths: readonly string[];

  constructor(backend: string, paths: readonly string[], options?: { cause?: unknown }) {
    super(backend, `${backend} ID table unavailable (checked ${paths.join(', ')})`, options);
    this.name = 'ResolverUnavailableError';
    this.paths = paths;
  }
}

export class ConfigError extends Error {
  readonly key?: string;

  constructor(message: string, key?: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * Coerces an unknown rejection into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
