/**
 * Device Probe
 *
 * Starts the built-in backends against real hardware and prints what the
 * providers report, a few rounds at a time.
 */

import { parseArgs } from 'node:util';
import { setTimeout as delay } from 'node:timers/promises';
import { createSubsystemLogger, formatError } from '../logging/subsystem.js';
import { ConfigError, DeviceStartupError } from '../devices/errors.js';
import { MAX_REFRESH_MS, parseDeviceVars, parseDuration } from '../devices/config/device-config.js';
import { DeviceRegistry } from '../devices/registry/registry.js';
import { registerBuiltinBackends } from '../devices/backends.js';
import type { DeviceVars } from '../devices/types/device-vars.js';
import type { MemoryInfo } from '../devices/types/memory-info.js';

const log = createSubsystemLogger('probe');

export const PROBE_USAGE = 'usage: devtelemetry-probe [--var key=value]... [--interval 2s] [--count N]';

export interface ProbeOptions {
  vars: DeviceVars;
  intervalMs: number;
  count: number;
}

export interface DeviceReport {
  temperatures: Map<string, number>;
  memory: Map<string, MemoryInfo>;
  usage: Map<string, number>;
  errors: Map<string, Error>;
}

export interface ProbeIO {
  write(line: string): void;
  sleep(ms: number): Promise<void>;
  /** Registry to run against; the built-in backends are registered on it */
  registry?: DeviceRegistry;
}

export function parseProbeArgs(argv: readonly string[]): ProbeOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      var: { type: 'string', multiple: true, default: [] },
      interval: { type: 'string', default: '1s' },
      count: { type: 'string', default: '1' },
    },
    strict: true,
    allowPositionals: false,
  });

  const interval = values.interval ?? '1s';
  const count = values.count ?? '1';

  const intervalMs = parseDuration(interval);
  if (intervalMs <= 0) {
    throw new ConfigError(`--interval must be positive, got "${interval}"`, 'interval');
  }
  if (intervalMs > MAX_REFRESH_MS) {
    throw new ConfigError(`--interval must be at most ${MAX_REFRESH_MS}ms, got "${interval}"`, 'interval');
  }
  if (!/^\d+$/.test(count) || Number.parseInt(count, 10) < 1) {
    throw new ConfigError(`--count must be a positive integer, got "${count}"`, 'count');
  }

  return {
    vars: parseDeviceVars(values.var ?? []),
    intervalMs,
    count: Number.parseInt(count, 10),
  };
}

export function collectReport(registry: DeviceRegistry): DeviceReport {
  const temperatures = new Map<string, number>();
  const memory = new Map<string, MemoryInfo>();
  const usage = new Map<string, number>();
  const errors = new Map<string, Error>();
  for (const source of [
    registry.updateUsage(usage, false),
    registry.updateTemperatures(temperatures),
    registry.updateMemory(memory),
  ]) {
    for (const [key, error] of source) {
      errors.set(key, error);
    }
  }
  return { temperatures, memory, usage, errors };
}

function formatBytes(bytes: number): string {
  const gib = bytes / 1024 ** 3;
  return gib >= 1 ? `${gib.toFixed(1)}GiB` : `${(bytes / 1024 ** 2).toFixed(0)}MiB`;
}

/**
 * One line per device, sorted by label, then one line per error
 */
export function formatReport(report: DeviceReport): string[] {
  const labels = new Set([...report.usage.keys(), ...report.temperatures.keys(), ...report.memory.keys()]);
  const lines = [...labels].sort().map((label) => {
    const usage = report.usage.get(label);
    const temperature = report.temperatures.get(label);
    const memory = report.memory.get(label);
    const parts = [
      label,
      `usage=${usage === undefined ? '-' : `${usage}%`}`,
      `temp=${temperature === undefined ? '-' : `${temperature}C`}`,
      `mem=${memory === undefined ? '-' : `${formatBytes(memory.used)}/${formatBytes(memory.total)} (${memory.usedPercent.toFixed(1)}%)`}`,
    ];
    return parts.join('  ');
  });
  for (const [key, error] of [...report.errors].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    lines.push(`error ${key}: ${error.message}`);
  }
  if (lines.length === 0) {
    lines.push('no devices');
  }
  return lines;
}

/**
 * Runs the probe and resolves to the process exit code
 */
export async function runProbe(argv: readonly string[], io: ProbeIO): Promise<number> {
  let options: ProbeOptions;
  try {
    options = parseProbeArgs(argv);
  } catch (error) {
    io.write(`devtelemetry-probe: ${formatError(error)}`);
    io.write(PROBE_USAGE);
    return 2;
  }

  const registry = io.registry ?? new DeviceRegistry();
  registerBuiltinBackends(registry);

  try {
    await registry.startup(options.vars);
  } catch (error) {
    const failures = error instanceof DeviceStartupError && error.errors.length > 0 ? error.errors : [error];
    for (const failure of failures) {
      io.write(`startup failed: ${formatError(failure)}`);
    }
    registry.shutdown();
    return 1;
  }

  try {
    for (let round = 1; round <= options.count; round++) {
      if (round > 1) {
        await io.sleep(options.intervalMs);
      }
      for (const line of formatReport(collectReport(registry))) {
        io.write(line);
      }
    }
  } finally {
    registry.shutdown();
  }
  log.debug('Probe finished', { rounds: options.count });
  return 0;
}

export const consoleProbeIO: ProbeIO = {
  write: (line) => console.log(line),
  sleep: (ms) => delay(ms),
};
