/**
 * AMD GPU Metric Readers
 *
 * Reads utilization, temperature and VRAM for one discovered GPU. Each
 * reader fails independently.
 */

import { join } from 'node:path';
import type { SysfsReader } from '../sysfs/sysfs-reader.js';
import type { MemoryInfo } from '../types/memory-info.js';

/**
 * Millidegrees to whole degrees, rounding halves up
 */
export function millidegreesToCelsius(millidegrees: number): number {
  return Math.trunc((millidegrees + 500) / 1000);
}

/**
 * Temperature from the first temp*_input of the first hwmon directory
 */
export async function readAmdTemperature(sysfs: SysfsReader, devicePath: string): Promise<number> {
  const hwmonPath = await sysfs.firstHwmonPath(devicePath);
  const inputPath = await sysfs.firstMatchingFile(hwmonPath, 'temp', '_input');
  return millidegreesToCelsius(await sysfs.readInt(inputPath));
}

export function readAmdBusy(sysfs: SysfsReader, devicePath: string): Promise<number> {
  return sysfs.readInt(join(devicePath, 'gpu_busy_percent'));
}

async function readUintWithFallback(sysfs: SysfsReader, primary: string, fallback: string): Promise<number> {
  try {
    return await sysfs.readUint(primary);
  } catch {
    return sysfs.readUint(fallback);
  }
}

/**
 * VRAM totals, falling back to the CPU-visible VRAM counters when the full
 * counters are missing
 */
export async function readAmdVram(sysfs: SysfsReader, devicePath: string): Promise<MemoryInfo> {
  const total = await readUintWithFallback(
    sysfs,
    join(devicePath, 'mem_info_vram_total'),
    join(devicePath, 'mem_info_vis_vram_total'),
  );
  const used = await readUintWithFallback(
    sysfs,
    join(devicePath, 'mem_info_vram_used'),
    join(devicePath, 'mem_info_vis_vram_used'),
  );
  if (total === 0) {
    throw new Error('total VRAM is zero');
  }
  return {
    total,
    used,
    usedPercent: (used / total) * 100,
  };
}
