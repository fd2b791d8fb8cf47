/**
 * Device Probe Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { PROBE_USAGE, formatReport, parseProbeArgs, runProbe } from './probe.js';
import { DeviceRegistry } from '../devices/registry/registry.js';
import { ConfigError } from '../devices/errors.js';
import type { MemoryInfo } from '../devices/types/memory-info.js';

vi.mock('../logging/subsystem.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../logging/subsystem.js')>();
  return {
    ...actual,
    createSubsystemLogger: vi.fn(() => ({
      subsystem: 'test',
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      debug: vi.fn(),
    })),
  };
});

const GIB = 1024 ** 3;

describe('parseProbeArgs', () => {
  it('should default to one round at one second', () => {
    expect(parseProbeArgs([])).toEqual({ vars: {}, intervalMs: 1000, count: 1 });
  });

  it('should collect repeated vars and parse the interval', () => {
    expect(parseProbeArgs([
      '--var', 'amd=true',
      '--var', 'amd-refresh=2s',
      '--interval', '500ms',
      '--count', '3',
    ])).toEqual({ vars: { amd: 'true', 'amd-refresh': '2s' }, intervalMs: 500, count: 3 });
  });

  it('should reject a zero count', () => {
    expect(() => parseProbeArgs(['--count', '0'])).toThrow('--count must be a positive integer, got "0"');
  });

  it('should reject a zero interval', () => {
    expect(() => parseProbeArgs(['--interval', '0'])).toThrow(ConfigError);
  });

  it('should reject an interval longer than a timer can wait', () => {
    expect(() => parseProbeArgs(['--interval', '720h'])).toThrow('--interval must be at most 2147483647ms, got "720h"');
  });

  it('should reject malformed vars', () => {
    expect(() => parseProbeArgs(['--var', '=true'])).toThrow('expected key=value, got "=true"');
  });

  it('should reject unknown flags', () => {
    expect(() => parseProbeArgs(['--bogus'])).toThrow();
  });
});

describe('formatReport', () => {
  it('should print one line per device and then the errors', () => {
    const memory = new Map<string, MemoryInfo>([
      ['MI300X.2f', { total: 192 * GIB, used: 48 * GIB, usedPercent: 25 }],
      ['Apple M1.0', { total: 1024 * 1024 * 1024 - 1, used: 512 * 1024 * 1024, usedPercent: 50 }],
    ]);

    const lines = formatReport({
      temperatures: new Map([['MI300X.2f', 46]]),
      usage: new Map([['MI300X.2f', 37], ['Apple M1.0', 0]]),
      memory,
      errors: new Map([['amd', new Error('cannot read /sys/class/drm')]]),
    });

    expect(lines).toEqual([
      'Apple M1.0  usage=0%  temp=-  mem=512MiB/1024MiB (50.0%)',
      'MI300X.2f  usage=37%  temp=46C  mem=48.0GiB/192.0GiB (25.0%)',
      'error amd: cannot read /sys/class/drm',
    ]);
  });

  it('should say so when nothing is reported', () => {
    expect(formatReport({ temperatures: new Map(), usage: new Map(), memory: new Map(), errors: new Map() })).toEqual([
      'no devices',
    ]);
  });
});

describe('runProbe', () => {
  function fakeIO(registry: DeviceRegistry) {
    const lines: string[] = [];
    const sleep = vi.fn(async (_ms: number) => {});
    return { lines, sleep, io: { write: (line: string) => lines.push(line), sleep, registry } };
  }

  it('should print every round and shut the registry down', async () => {
    const registry = new DeviceRegistry();
    registry.registerStartup(async (_vars, target) => {
      target.registerTemp((out) => {
        out.set('fake.0', 50);
        return new Map();
      });
    });
    const { lines, sleep, io } = fakeIO(registry);

    const code = await runProbe(['--var', 'amd=false', '--count', '2', '--interval', '1s'], io);

    expect(code).toBe(0);
    expect(lines).toEqual([
      'fake.0  usage=-  temp=50C  mem=-',
      'fake.0  usage=-  temp=50C  mem=-',
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(registry.isShutdown()).toBe(true);
  });

  it('should exit with 1 when a backend fails to start', async () => {
    const registry = new DeviceRegistry();
    registry.registerStartup(async () => {
      throw new Error('AMD GPU error: no AMD GPUs found');
    });
    const { lines, io } = fakeIO(registry);

    const code = await runProbe(['--var', 'amd=false'], io);

    expect(code).toBe(1);
    expect(lines).toEqual(['startup failed: AMD GPU error: no AMD GPUs found']);
    expect(registry.isShutdown()).toBe(true);
  });

  it('should print usage and exit with 2 on bad arguments', async () => {
    const { lines, io } = fakeIO(new DeviceRegistry());

    const code = await runProbe(['--count', 'many'], io);

    expect(code).toBe(2);
    expect(lines).toEqual(['devtelemetry-probe: --count must be a positive integer, got "many"', PROBE_USAGE]);
  });
});
