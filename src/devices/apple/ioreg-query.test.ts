/**
 * IOAccelerator Query Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { IOREG_ARGS, IoregGpuQuery, parseIoregAccelerators } from './ioreg-query.js';

const { execFileMock, memMock } = vi.hoisted(() => ({
  execFileMock: vi.fn<(file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>>(),
  memMock: vi.fn<() => Promise<{ total: number }>>(),
}));

vi.mock('node:child_process', async () => {
  const { promisify } = await import('node:util');
  return { execFile: Object.assign(() => undefined, { [promisify.custom]: execFileMock }) };
});

vi.mock('systeminformation', () => ({
  default: { mem: memMock },
}));

const GIB = 1024 ** 3;

const UNIFIED_OUTPUT = [
  '+-o AGXAcceleratorG14X  <class AGXAcceleratorG14X, id 0x100000a31, registered, matched, active, busy 0 (0 ms), retain 69>',
  '    {',
  '      "IOClass" = "AGXAcceleratorG14X"',
  '      "model" = "Apple M2 Pro"',
  '      "PerformanceStatistics" = {"In use system memory"=1048576,"Device Utilization %"=12,"Alloc system memory"=2147483648,"Renderer Utilization %"=10}',
  '      "gpu-core-count" = 19',
  '    }',
  '',
].join('\n');

const DISCRETE_OUTPUT = [
  '+-o AMDRadeonX6000_AMDNavi21GraphicsAccelerator  <class AMDRadeonX6000_AMDNavi21GraphicsAccelerator, id 0x1000007d2, registered>',
  '    {',
  '      "model" = "AMD Radeon Pro W6800X"',
  '      "VRAM,totalMB" = 32768',
  '      "PerformanceStatistics" = {"Device Utilization %"=3,"vramUsedBytes"=1073741824}',
  '    }',
  '+-o IntelAccelerator  <class IntelAccelerator, id 0x1000004b0, registered>',
  '    {',
  '      "IOClass" = "IntelAccelerator"',
  '    }',
  '',
].join('\n');

describe('parseIoregAccelerators', () => {
  it('should report host memory as the total for unified-memory GPUs', () => {
    expect(parseIoregAccelerators(UNIFIED_OUTPUT, 32 * GIB)).toEqual([
      { name: 'Apple M2 Pro', totalMemory: 32 * GIB, usedMemory: 2 * GIB, utilization: 12 },
    ]);
  });

  it('should read dedicated VRAM and default missing properties', () => {
    expect(parseIoregAccelerators(DISCRETE_OUTPUT, 32 * GIB)).toEqual([
      { name: 'AMD Radeon Pro W6800X', totalMemory: 32 * GIB, usedMemory: GIB, utilization: 3 },
      { name: 'Apple GPU', totalMemory: 32 * GIB, usedMemory: 0, utilization: -1 },
    ]);
  });

  it('should ignore a negative allocation', () => {
    const output = UNIFIED_OUTPUT.replace('"Alloc system memory"=2147483648', '"Alloc system memory"=-1');

    expect(parseIoregAccelerators(output, 8 * GIB)[0]?.usedMemory).toBe(0);
  });

  it('should return nothing for empty output', () => {
    expect(parseIoregAccelerators('', 8 * GIB)).toEqual([]);
  });
});

describe('IoregGpuQuery', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    execFileMock.mockResolvedValue({ stdout: UNIFIED_OUTPUT, stderr: '' });
    memMock.mockResolvedValue({ total: 16 * GIB });
  });

  it('should run ioreg and combine its output with host memory', async () => {
    const result = await new IoregGpuQuery().query();

    expect(execFileMock).toHaveBeenCalledWith('ioreg', [...IOREG_ARGS]);
    expect(result.devices).toEqual([
      { name: 'Apple M2 Pro', totalMemory: 16 * GIB, usedMemory: 2 * GIB, utilization: 12 },
    ]);
  });

  it('should drop its readings once released', async () => {
    const result = await new IoregGpuQuery().query();

    result.release();

    expect(result.devices).toEqual([]);
  });

  it('should reject when ioreg fails', async () => {
    execFileMock.mockRejectedValue(new Error('spawn ioreg ENOENT'));

    await expect(new IoregGpuQuery().query()).rejects.toThrow('spawn ioreg ENOENT');
  });
});
