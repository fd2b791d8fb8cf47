/**
 * nvidia-smi Query
 *
 * Reads per-GPU name, index, temperature, utilization and framebuffer memory
 * in one `nvidia-smi` call. Unsupported fields come back as undefined.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export const NVIDIA_SMI_COMMAND = 'nvidia-smi';
export const NVIDIA_SMI_ARGS: readonly string[] = [
  '--query-gpu=name,index,temperature.gpu,utilization.gpu,memory.total,memory.used',
  '--format=csv,noheader,nounits',
];

const MIB = 1024 * 1024;
const FIELD_COUNT = 6;

export interface NvidiaGpuReading {
  name: string;
  index: number;
  /** Degrees Celsius */
  temperature?: number;
  /** Percent busy */
  utilization?: number;
  /** Bytes */
  totalMemory?: number;
  /** Bytes */
  usedMemory?: number;
}

function parseField(raw: string | undefined): number | undefined {
  const value = raw?.trim() ?? '';
  if (!/^-?\d+(\.\d+)?$/.test(value)) {
    // [N/A], [Not Supported] and the like
    return undefined;
  }
  return Number.parseFloat(value);
}

function mibToBytes(mib: number | undefined): number | undefined {
  return mib === undefined ? undefined : mib * MIB;
}

/**
 * Parses `--format=csv,noheader,nounits` output. Lines with fewer than six
 * fields are skipped.
 */
export function parseNvidiaSmiCsv(text: string): NvidiaGpuReading[] {
  const readings: NvidiaGpuReading[] = [];
  for (const line of text.split('\n')) {
    const fields = line.split(',').map((field) => field.trim());
    if (fields.length < FIELD_COUNT) {
      continue;
    }
    const [name = '', index, temperature, utilization, total, used] = fields;
    readings.push({
      name,
      index: parseField(index) ?? readings.length,
      temperature: parseField(temperature),
      utilization: parseField(utilization),
      totalMemory: mibToBytes(parseField(total)),
      usedMemory: mibToBytes(parseField(used)),
    });
  }
  return readings;
}

export interface NvidiaQuery {
  query(): Promise<NvidiaGpuReading[]>;
}

export class NvidiaSmiQuery implements NvidiaQuery {
  private readonly command: string;

  constructor(command: string = NVIDIA_SMI_COMMAND) {
    this.command = command;
  }

  async query(): Promise<NvidiaGpuReading[]> {
    const { stdout } = await execFileAsync(this.command, [...NVIDIA_SMI_ARGS]);
    return parseNvidiaSmiCsv(stdout);
  }
}
