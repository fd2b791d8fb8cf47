/**
 * Test Setup for Device Telemetry
 *
 * Shared fast-check generators and a throwaway sysfs tree builder for tests
 * that exercise discovery and metric reads against real files.
 */

import * as fc from 'fast-check';
import { mkdtemp, mkdir, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { SysfsReader } from './sysfs/sysfs-reader.js';
import { GpuIdResolver } from './ids/gpu-ids.js';

const hexByte = fc.integer({ min: 0, max: 0xff }).map((value) => value.toString(16).padStart(2, '0'));

// PCI slot names such as 0000:2f:00.0
export const pciSlotArbitrary: fc.Arbitrary<string> = fc
  .tuple(fc.constantFrom('0000', '0001'), hexByte, fc.integer({ min: 0, max: 0x1f }), fc.integer({ min: 0, max: 7 }))
  .map(([domain, bus, device, fn]) => `${domain}:${bus}:${device.toString(16).padStart(2, '0')}.${fn}`);

export const propertyTestConfig = {
  numRuns: 30,
  timeout: 5000,
  verbose: false,
};

export const SYSFS_DEVICES_ROOT = '/sys/devices/pci0000:00';

export interface FakeGpuOptions {
  slot: string;
  /** drm card name; omitted means the device has no drm class entry */
  card?: string;
  vendor?: string;
  device?: string;
  revision?: string;
  /** Bound driver; null leaves the device unbound */
  driver?: string | null;
  /** Adds a link under /sys/bus/pci/drivers/amdgpu */
  amdgpuBinding?: boolean;
  busyPercent?: string;
  /** temp1_input, temp2_input, ... in millidegrees */
  temperatures?: string[];
  vramTotal?: string;
  vramUsed?: string;
  visVramTotal?: string;
  visVramUsed?: string;
}

/**
 * A sysfs-shaped directory tree under the OS temp directory. Paths passed
 * in are absolute sysfs paths and are rooted under the tree.
 */
export class FakeSysfs {
  readonly root: string;

  private constructor(root: string) {
    this.root = root;
  }

  static async create(): Promise<FakeSysfs> {
    const sysfs = new FakeSysfs(await mkdtemp(join(tmpdir(), 'devtelemetry-sysfs-')));
    await sysfs.mkdir('/sys/class/drm');
    await sysfs.mkdir('/sys/bus/pci/devices');
    await sysfs.mkdir('/sys/bus/pci/drivers/amdgpu');
    for (const control of ['bind', 'unbind', 'new_id', 'remove_id', 'uevent']) {
      await sysfs.write(`/sys/bus/pci/drivers/amdgpu/${control}`, '');
    }
    return sysfs;
  }

  path(sysfsPath: string): string {
    return join(this.root, sysfsPath);
  }

  reader(): SysfsReader {
    return new SysfsReader(this.root);
  }

  async mkdir(sysfsPath: string): Promise<void> {
    await mkdir(this.path(sysfsPath), { recursive: true });
  }

  async write(sysfsPath: string, content: string): Promise<void> {
    await mkdir(dirname(this.path(sysfsPath)), { recursive: true });
    await writeFile(this.path(sysfsPath), content);
  }

  async link(target: string, sysfsPath: string): Promise<void> {
    await mkdir(dirname(this.path(sysfsPath)), { recursive: true });
    await symlink(this.path(target), this.path(sysfsPath));
  }

  async remove(sysfsPath: string): Promise<void> {
    await rm(this.path(sysfsPath), { recursive: true, force: true });
  }

  /**
   * Writes an amdgpu.ids table and returns a resolver reading it
   */
  async idResolver(text: string): Promise<GpuIdResolver> {
    await this.write('/usr/share/libdrm/amdgpu.ids', text);
    return new GpuIdResolver([this.path('/usr/share/libdrm/amdgpu.ids')]);
  }

  /** Resolver pointing at a table that does not exist */
  missingIdResolver(): GpuIdResolver {
    return new GpuIdResolver([this.path('/usr/share/libdrm/missing.ids')]);
  }

  /**
   * Creates a PCI device directory and its drm and driver links; returns
   * the device directory
   */
  async addGpu(gpu: FakeGpuOptions): Promise<string> {
    const devicePath = `${SYSFS_DEVICES_ROOT}/${gpu.slot}`;
    await this.write(`${devicePath}/vendor`, `${gpu.vendor ?? '0x1002'}\n`);
    await this.write(`${devicePath}/device`, `${gpu.device ?? '0x74a1'}\n`);
    await this.write(`${devicePath}/revision`, `${gpu.revision ?? '0x00'}\n`);
    await this.write(`${devicePath}/uevent`, `DRIVER=${gpu.driver ?? ''}\nPCI_CLASS=38000\nPCI_SLOT_NAME=${gpu.slot}\n`);
    await this.link(devicePath, `/sys/bus/pci/devices/${gpu.slot}`);

    const driver = gpu.driver === undefined ? 'amdgpu' : gpu.driver;
    if (driver !== null) {
      await this.mkdir(`/sys/bus/pci/drivers/${driver}`);
      await this.link(`/sys/bus/pci/drivers/${driver}`, `${devicePath}/driver`);
    }
    if (gpu.amdgpuBinding) {
      await this.link(devicePath, `/sys/bus/pci/drivers/amdgpu/${gpu.slot}`);
    }

    if (gpu.busyPercent !== undefined) {
      await this.write(`${devicePath}/gpu_busy_percent`, `${gpu.busyPercent}\n`);
    }
    for (const [index, millidegrees] of (gpu.temperatures ?? []).entries()) {
      await this.write(`${devicePath}/hwmon/hwmon3/temp${index + 1}_input`, `${millidegrees}\n`);
    }
    const memFiles: Array<[string, string | undefined]> = [
      ['mem_info_vram_total', gpu.vramTotal],
      ['mem_info_vram_used', gpu.vramUsed],
      ['mem_info_vis_vram_total', gpu.visVramTotal],
      ['mem_info_vis_vram_used', gpu.visVramUsed],
    ];
    for (const [name, value] of memFiles) {
      if (value !== undefined) {
        await this.write(`${devicePath}/${name}`, `${value}\n`);
      }
    }

    if (gpu.card !== undefined) {
      const cardDir = `${devicePath}/drm/${gpu.card}`;
      await this.mkdir(cardDir);
      await this.link(devicePath, `${cardDir}/device`);
      await this.link(cardDir, `/sys/class/drm/${gpu.card}`);
    }
    return devicePath;
  }

  async cleanup(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }
}
