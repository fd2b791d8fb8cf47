/**
 * GPU ID Table Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GpuIdResolver, idKey, parseAmdGpuIds } from './gpu-ids.js';
import { ResolverUnavailableError } from '../errors.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

const SAMPLE_IDS = [
  '# List of AMDGPU IDs',
  '#',
  '# Syntax:',
  '# device_id,\trevision_id,\tproduct_name        <-- single tab after comma',
  '',
  '1.0.0',
  '74A1,\tC0,\tAMD Instinct MI300X',
  '740F,\t02,\tAMD Instinct MI210',
  '73BF,\tC1,\tAMD Radeon RX 6900 XT, Founders, Edition',
  'ZZZZ,\t00,\tNot A Device',
  '7400,\t,\tMissing Revision',
  '7401,\t01',
].join('\n');

describe('GPU ID Table', () => {
  describe('parseAmdGpuIds', () => {
    it('should parse device and revision ids as hex', () => {
      const ids = parseAmdGpuIds(SAMPLE_IDS);

      expect(ids.get(idKey(0x74a1, 0xc0))).toBe('AMD Instinct MI300X');
      expect(ids.get(idKey(0x740f, 0x02))).toBe('AMD Instinct MI210');
    });

    it('should keep commas inside the name column', () => {
      const ids = parseAmdGpuIds(SAMPLE_IDS);

      expect(ids.get(idKey(0x73bf, 0xc1))).toBe('AMD Radeon RX 6900 XT, Founders, Edition');
    });

    it('should skip comments, the version line and malformed rows', () => {
      const ids = parseAmdGpuIds(SAMPLE_IDS);

      expect(ids.size).toBe(3);
    });

    it('should accept 0x prefixes', () => {
      const ids = parseAmdGpuIds('0x74A1, 0xC0, AMD Instinct MI300X\n');

      expect(ids.get(idKey(0x74a1, 0xc0))).toBe('AMD Instinct MI300X');
    });
  });

  describe('GpuIdResolver', () => {
    let dir: string;

    beforeEach(async () => {
      vi.mocked(readFile).mockClear();
      dir = await mkdtemp(join(tmpdir(), 'devtelemetry-ids-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should resolve names from the first readable path', async () => {
      const tablePath = join(dir, 'amdgpu.ids');
      await writeFile(tablePath, SAMPLE_IDS);
      const resolver = new GpuIdResolver([join(dir, 'missing.ids'), tablePath]);

      expect(await resolver.lookup(0x74a1, 0xc0)).toBe('AMD Instinct MI300X');
      expect(await resolver.lookup(0x74a1, 0xc1)).toBeUndefined();
      expect(resolver.isUnavailable()).toBe(false);
    });

    it('should report unavailable when no table exists', async () => {
      const resolver = new GpuIdResolver([join(dir, 'missing.ids')]);

      const result = await resolver.load();

      expect(result.error).toBeInstanceOf(ResolverUnavailableError);
      expect(result.ids).toBeUndefined();
      expect(await resolver.lookup(0x74a1, 0xc0)).toBeUndefined();
      expect(resolver.isUnavailable()).toBe(true);
    });

    it('should load once for concurrent first callers', async () => {
      const tablePath = join(dir, 'amdgpu.ids');
      await writeFile(tablePath, SAMPLE_IDS);
      vi.mocked(readFile).mockClear();
      const resolver = new GpuIdResolver([tablePath]);

      const results = await Promise.all([resolver.load(), resolver.load(), resolver.lookup(0x740f, 0x02)]);

      expect(results[0]).toBe(results[1]);
      expect(results[2]).toBe('AMD Instinct MI210');
      expect(vi.mocked(readFile)).toHaveBeenCalledTimes(1);
    });
  });
});
