/**
 * AMD GPU Discovery
 *
 * Enumerates AMD GPUs from the drm class directory, falling back to the
 * amdgpu driver's bound devices when no drm card matches. Runs every cycle,
 * so hot-plugged cards appear and removed ones disappear.
 */

import { join } from 'node:path';
import { DiscoveryError } from '../errors.js';
import { SysfsReader, type DirEntry } from '../sysfs/sysfs-reader.js';
import { defaultGpuIdResolver, type GpuIdResolver } from '../ids/gpu-ids.js';
import { formatAmdLabel, uniqueLabels } from '../naming/labels.js';

export const AMD_BACKEND = 'amd';
export const AMD_VENDOR_ID = 0x1002;
export const DRM_CLASS_PATH = '/sys/class/drm';
export const AMDGPU_DRIVER_PATH = '/sys/bus/pci/drivers/amdgpu';
export const PCI_DEVICES_PATH = '/sys/bus/pci/devices';

/** Drivers an AMD display device may be bound to; '' means unbound */
const ACCEPTED_DRIVERS: ReadonlySet<string> = new Set(['', 'amdgpu', 'radeon']);

/** Control files living next to the device links in a driver directory */
const DRIVER_CONTROL_PREFIXES = ['bind', 'unbind', 'new_id', 'remove_id', 'uevent'];

export interface AmdGpu {
  /** Unique, deterministic display label */
  label: string;
  /** drm card name, or the PCI address when found through the driver */
  card: string;
  /** Device directory holding vendor, hwmon and mem_info files */
  devicePath: string;
}

export interface AmdDiscoveryOptions {
  sysfs?: SysfsReader;
  resolver?: GpuIdResolver;
}

interface AmdCandidate {
  card: string;
  devicePath: string;
}

async function isAmdVendor(sysfs: SysfsReader, devicePath: string): Promise<boolean> {
  try {
    return (await sysfs.readHex(join(devicePath, 'vendor'))) === AMD_VENDOR_ID;
  } catch {
    return false;
  }
}

async function scanDrmClass(sysfs: SysfsReader): Promise<AmdCandidate[]> {
  let entries: DirEntry[];
  try {
    entries = await sysfs.listDir(DRM_CLASS_PATH);
  } catch (error) {
    throw new DiscoveryError(AMD_BACKEND, `cannot read ${DRM_CLASS_PATH}`, { cause: error, path: DRM_CLASS_PATH });
  }

  const candidates: AmdCandidate[] = [];
  for (const entry of entries) {
    // connectors (card0-DP-1) and render nodes share the namespace
    if (!entry.isDirectory || !entry.name.startsWith('card') || entry.name.includes('-')) {
      continue;
    }
    const devicePath = join(DRM_CLASS_PATH, entry.name, 'device');
    if (!(await isAmdVendor(sysfs, devicePath))) {
      continue;
    }
    if (!ACCEPTED_DRIVERS.has(await sysfs.driverName(devicePath))) {
      continue;
    }
    candidates.push({ card: entry.name, devicePath });
  }
  return candidates;
}

async function scanDriverBindings(sysfs: SysfsReader): Promise<AmdCandidate[]> {
  let entries: DirEntry[];
  try {
    entries = await sysfs.listDir(AMDGPU_DRIVER_PATH);
  } catch (error) {
    throw new DiscoveryError(AMD_BACKEND, `cannot read ${AMDGPU_DRIVER_PATH}`, { cause: error, path: AMDGPU_DRIVER_PATH });
  }

  const candidates: AmdCandidate[] = [];
  for (const entry of entries) {
    const name = entry.name;
    if (name === '' || DRIVER_CONTROL_PREFIXES.some((prefix) => name.startsWith(prefix))) {
      continue;
    }
    const devicePath = join(PCI_DEVICES_PATH, name);
    if (!(await sysfs.exists(devicePath))) {
      continue;
    }
    if (!(await isAmdVendor(sysfs, devicePath))) {
      continue;
    }
    candidates.push({ card: name, devicePath });
  }
  return candidates;
}

async function resolveModelName(sysfs: SysfsReader, resolver: GpuIdResolver, devicePath: string): Promise<string | undefined> {
  try {
    const deviceId = await sysfs.readHex(join(devicePath, 'device'));
    const revisionId = await sysfs.readHex(join(devicePath, 'revision'));
    return await resolver.lookup(deviceId, revisionId);
  } catch {
    return undefined;
  }
}

async function amdLabel(sysfs: SysfsReader, resolver: GpuIdResolver, candidate: AmdCandidate): Promise<string> {
  const slot = await sysfs.pciSlotName(candidate.devicePath);
  const model = await resolveModelName(sysfs, resolver, candidate.devicePath);
  return formatAmdLabel(model, slot, candidate.card);
}

/**
 * Lists the AMD GPUs present right now. Throws DiscoveryError when the
 * topology directory itself cannot be read.
 */
export async function discoverAmdGpus(options: AmdDiscoveryOptions = {}): Promise<AmdGpu[]> {
  const sysfs = options.sysfs ?? new SysfsReader();
  const resolver = options.resolver ?? defaultGpuIdResolver;

  let candidates = await scanDrmClass(sysfs);
  if (candidates.length === 0) {
    candidates = await scanDriverBindings(sysfs);
  }

  const labels: string[] = [];
  for (const candidate of candidates) {
    labels.push(await amdLabel(sysfs, resolver, candidate));
  }
  const unique = uniqueLabels(labels);

  return candidates.map((candidate, index) => ({
    label: unique[index] ?? candidate.card,
    card: candidate.card,
    devicePath: candidate.devicePath,
  }));
}
