/**
 * Sysfs Reader
 *
 * Leaf-file reads under the kernel's device topology. Every read is
 * independent and may fail on its own; parse failures throw so callers can
 * record them against the device being read.
 */

import { readFile, readdir, readlink, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';

const PCI_SLOT_PREFIX = 'PCI_SLOT_NAME=';
const INT32_MAX = 2 ** 31 - 1;
const INT32_MIN = -(2 ** 31);

export class SysfsParseError extends Error {
  readonly path: string;

  constructor(path: string, raw: string, expected: string) {
    super(`${path}: expected ${expected}, got "${raw}"`);
    this.name = 'SysfsParseError';
    this.path = path;
  }
}

export interface DirEntry {
  name: string;
  isDirectory: boolean;
  isFile: boolean;
}

export class SysfsReader {
  /** Filesystem root the absolute sysfs paths are resolved under */
  readonly root: string;

  constructor(root: string = '/') {
    this.root = root;
  }

  resolve(path: string): string {
    return this.root === '/' ? path : join(this.root, path);
  }

  async readText(path: string): Promise<string> {
    return (await readFile(this.resolve(path), 'utf8')).trim();
  }

  /**
   * Reads a "0x"-prefixed or bare hex value such as a PCI vendor id
   */
  async readHex(path: string): Promise<number> {
    const raw = await this.readText(path);
    const digits = raw.replace(/^0x/i, '');
    if (!/^[0-9a-f]+$/i.test(digits)) {
      throw new SysfsParseError(path, raw, 'a hex integer');
    }
    const value = Number.parseInt(digits, 16);
    if (value > 0xffffffff) {
      throw new SysfsParseError(path, raw, 'a 32-bit hex integer');
    }
    return value;
  }

  async readInt(path: string): Promise<number> {
    const raw = await this.readText(path);
    if (!/^[-+]?\d+$/.test(raw)) {
      throw new SysfsParseError(path, raw, 'a decimal integer');
    }
    const value = Number.parseInt(raw, 10);
    if (value > INT32_MAX || value < INT32_MIN) {
      throw new SysfsParseError(path, raw, 'a 32-bit integer');
    }
    return value;
  }

  async readUint(path: string): Promise<number> {
    const raw = await this.readText(path);
    if (!/^\+?\d+$/.test(raw)) {
      throw new SysfsParseError(path, raw, 'an unsigned integer');
    }
    const value = Number.parseInt(raw, 10);
    if (value > Number.MAX_SAFE_INTEGER) {
      throw new SysfsParseError(path, raw, 'an unsigned integer below 2^53');
    }
    return value;
  }

  async listDir(path: string): Promise<DirEntry[]> {
    const entries = await readdir(this.resolve(path), { withFileTypes: true });
    const listed = await Promise.all(entries.map(async (entry) => {
      if (!entry.isSymbolicLink()) {
        return { name: entry.name, isDirectory: entry.isDirectory(), isFile: entry.isFile() };
      }
      // drm and pci entries are usually symlinks into /sys/devices
      try {
        const target = await stat(join(this.resolve(path), entry.name));
        return { name: entry.name, isDirectory: target.isDirectory(), isFile: target.isFile() };
      } catch {
        return { name: entry.name, isDirectory: false, isFile: false };
      }
    }));
    return listed.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolve(path));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Basename of a symlink's target, or '' when the link is absent
   */
  async readLinkBase(path: string): Promise<string> {
    try {
      return basename(await readlink(this.resolve(path)));
    } catch {
      return '';
    }
  }

  /**
   * The bound kernel driver of a device, or '' when unbound
   */
  driverName(devicePath: string): Promise<string> {
    return this.readLinkBase(join(devicePath, 'driver'));
  }

  /**
   * PCI_SLOT_NAME from the device's uevent file, or '' when unavailable
   */
  async pciSlotName(devicePath: string): Promise<string> {
    let uevent: string;
    try {
      uevent = await this.readText(join(devicePath, 'uevent'));
    } catch {
      return '';
    }
    const line = uevent.split('\n').find((entry) => entry.startsWith(PCI_SLOT_PREFIX));
    return line ? line.slice(PCI_SLOT_PREFIX.length).trim() : '';
  }

  async firstHwmonPath(devicePath: string): Promise<string> {
    const hwmonRoot = join(devicePath, 'hwmon');
    const entries = await this.listDir(hwmonRoot);
    const first = entries.find((entry) => entry.isDirectory);
    if (!first) {
      throw new Error(`no hwmon directory under ${hwmonRoot}`);
    }
    return join(hwmonRoot, first.name);
  }

  async firstMatchingFile(dir: string, prefix: string, suffix: string): Promise<string> {
    const entries = await this.listDir(dir);
    const match = entries.find((entry) => entry.isFile && entry.name.startsWith(prefix) && entry.name.endsWith(suffix));
    if (!match) {
      throw new Error(`no ${prefix}*${suffix} file found in ${dir}`);
    }
    return join(dir, match.name);
  }
}
