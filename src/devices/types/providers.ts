/**
 * Provider Callback Types
 *
 * Shapes of the callbacks the rendering layer invokes to pull cached
 * telemetry, and of the startup functions that register them.
 */

import type { MemoryInfo } from './memory-info.js';
import type { DeviceVars } from './device-vars.js';
import type { DeviceRegistry } from '../registry/registry.js';

/** Device label to the last error recorded for it (or a backend-wide key) */
export type DeviceErrors = Map<string, Error>;

/** Merges cached temperatures (whole degrees Celsius) into `out` */
export type TemperatureProvider = (out: Map<string, number>) => DeviceErrors;

/** Merges cached memory figures into `out` */
export type MemoryProvider = (out: Map<string, MemoryInfo>) => DeviceErrors;

/**
 * Merges cached utilization percentages into `out`. `logical` is the
 * rendering layer's per-core mode flag; device backends ignore it.
 */
export type UsageProvider = (out: Map<string, number>, logical: boolean) => DeviceErrors;

/**
 * Backend initialization. Rejects only when the backend cannot start and the
 * user asked for it explicitly; auto-detected backends resolve inert instead.
 */
export type StartupFunction = (vars: DeviceVars, registry: DeviceRegistry) => Promise<void>;

export type MetricKind = 'temperature' | 'usage' | 'memory';
