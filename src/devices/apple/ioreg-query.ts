/**
 * IOAccelerator Query
 *
 * Enumerates Apple GPUs from the IORegistry via `ioreg`. Unified-memory
 * devices (no dedicated VRAM property) report host RAM as their total and
 * the driver's system-memory allocation as used.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import si from 'systeminformation';
import { UTILIZATION_UNAVAILABLE, type GpuDeviceReading, type GpuQuery, type GpuQueryResult } from './gpu-query.js';

const execFileAsync = promisify(execFile);

export const IOREG_COMMAND = 'ioreg';
export const IOREG_ARGS: readonly string[] = ['-r', '-d', '1', '-w', '0', '-c', 'IOAccelerator'];
export const DEFAULT_APPLE_GPU_NAME = 'Apple GPU';

const MIB = 1024 * 1024;

function escapeKey(key: string): string {
  return key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function stringProperty(entry: string, key: string): string | undefined {
  return new RegExp(`"${escapeKey(key)}"\\s*=\\s*"([^"]*)"`).exec(entry)?.[1];
}

function numberProperty(entry: string, key: string): number | undefined {
  const raw = new RegExp(`"${escapeKey(key)}"\\s*=\\s*(-?\\d+)`).exec(entry)?.[1];
  return raw === undefined ? undefined : Number.parseInt(raw, 10);
}

/**
 * Parses `ioreg -c IOAccelerator` text output into one reading per
 * accelerator entry
 */
export function parseIoregAccelerators(text: string, hostMemoryBytes: number): GpuDeviceReading[] {
  const entries = text.split(/^\+-o /m).slice(1);
  return entries.map((entry) => {
    const name = stringProperty(entry, 'model')?.trim() || DEFAULT_APPLE_GPU_NAME;
    const utilization = numberProperty(entry, 'Device Utilization %') ?? UTILIZATION_UNAVAILABLE;
    const vramTotalMb = numberProperty(entry, 'VRAM,totalMB');

    if (vramTotalMb === undefined) {
      const allocated = numberProperty(entry, 'Alloc system memory') ?? 0;
      return {
        name,
        totalMemory: hostMemoryBytes,
        usedMemory: allocated > 0 ? allocated : 0,
        utilization,
      };
    }

    return {
      name,
      totalMemory: vramTotalMb * MIB,
      usedMemory: numberProperty(entry, 'vramUsedBytes') ?? 0,
      utilization,
    };
  });
}

export class IoregGpuQuery implements GpuQuery {
  async query(): Promise<GpuQueryResult> {
    const [{ stdout }, memory] = await Promise.all([
      execFileAsync(IOREG_COMMAND, [...IOREG_ARGS]),
      si.mem(),
    ]);
    let devices: GpuDeviceReading[] = parseIoregAccelerators(stdout, memory.total);
    return {
      get devices() {
        return devices;
      },
      release: () => {
        devices = [];
      },
    };
  }
}
