/**
 * nvidia-smi Query Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NVIDIA_SMI_ARGS, NvidiaSmiQuery, parseNvidiaSmiCsv } from './nvidia-smi.js';

const { execFileMock } = vi.hoisted(() => ({
  execFileMock: vi.fn<(file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>>(),
}));

vi.mock('node:child_process', async () => {
  const { promisify } = await import('node:util');
  return { execFile: Object.assign(() => undefined, { [promisify.custom]: execFileMock }) };
});

const MIB = 1024 * 1024;

const SMI_OUTPUT = [
  'NVIDIA GeForce RTX 4090, 0, 45, 12, 24564, 1024',
  'NVIDIA A100-SXM4-80GB, 1, [N/A], [Not Supported], 81920, 0',
  'truncated, 2, 50',
  '',
].join('\n');

describe('parseNvidiaSmiCsv', () => {
  it('should parse every complete line and convert MiB to bytes', () => {
    expect(parseNvidiaSmiCsv(SMI_OUTPUT)).toEqual([
      {
        name: 'NVIDIA GeForce RTX 4090',
        index: 0,
        temperature: 45,
        utilization: 12,
        totalMemory: 24564 * MIB,
        usedMemory: 1024 * MIB,
      },
      {
        name: 'NVIDIA A100-SXM4-80GB',
        index: 1,
        temperature: undefined,
        utilization: undefined,
        totalMemory: 81920 * MIB,
        usedMemory: 0,
      },
    ]);
  });

  it('should return nothing for empty output', () => {
    expect(parseNvidiaSmiCsv('')).toEqual([]);
  });
});

describe('NvidiaSmiQuery', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should query nvidia-smi in CSV mode', async () => {
    execFileMock.mockResolvedValue({ stdout: SMI_OUTPUT, stderr: '' });

    const readings = await new NvidiaSmiQuery().query();

    expect(execFileMock).toHaveBeenCalledWith('nvidia-smi', [...NVIDIA_SMI_ARGS]);
    expect(readings.map((reading) => reading.name)).toEqual(['NVIDIA GeForce RTX 4090', 'NVIDIA A100-SXM4-80GB']);
  });

  it('should reject when nvidia-smi is missing', async () => {
    execFileMock.mockRejectedValue(new Error('spawn nvidia-smi ENOENT'));

    await expect(new NvidiaSmiQuery().query()).rejects.toThrow('spawn nvidia-smi ENOENT');
  });
});
