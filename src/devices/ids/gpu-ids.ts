/**
 * GPU ID Table
 *
 * Resolves (device id, revision id) pairs to marketing names using the
 * libdrm `amdgpu.ids` database. The table is read at most once per resolver;
 * a missing table is reported as unavailable and callers fall back to
 * generic labels.
 */

import { readFile } from 'node:fs/promises';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ResolverUnavailableError } from '../errors.js';

const log = createSubsystemLogger('devices/gpu-ids');

export const DEFAULT_AMDGPU_IDS_PATHS: readonly string[] = ['/usr/share/libdrm/amdgpu.ids'];

export type GpuIdTable = ReadonlyMap<string, string>;

export type GpuIdLoadResult =
  | { ids: GpuIdTable; error?: undefined }
  | { ids?: undefined; error: ResolverUnavailableError };

export function idKey(deviceId: number, revisionId: number): string {
  return `${deviceId.toString(16)}:${revisionId.toString(16)}`;
}

function parseHexField(field: string): number | undefined {
  const digits = field.replace(/^0x/i, '');
  if (!/^[0-9a-f]+$/i.test(digits)) {
    return undefined;
  }
  const value = Number.parseInt(digits, 16);
  return value <= 0xffffffff ? value : undefined;
}

/**
 * Parses `device, revision, name` rows. Comments, blank lines and malformed
 * rows are skipped; commas inside the name are kept.
 */
export function parseAmdGpuIds(text: string): Map<string, string> {
  const ids = new Map<string, string>();
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || !line.includes(',')) {
      continue;
    }
    const [devField = '', revField = '', ...nameParts] = line.split(',');
    if (nameParts.length === 0) {
      continue;
    }
    const dev = devField.trim();
    const rev = revField.trim();
    const name = nameParts.join(',').trim();
    if (dev === '' || rev === '' || name === '') {
      continue;
    }
    const deviceId = parseHexField(dev);
    const revisionId = parseHexField(rev);
    if (deviceId === undefined || revisionId === undefined) {
      continue;
    }
    ids.set(idKey(deviceId, revisionId), name);
  }
  return ids;
}

export class GpuIdResolver {
  private readonly paths: readonly string[];
  private readonly backend: string;
  private loading?: Promise<GpuIdLoadResult>;
  private loaded?: GpuIdLoadResult;

  constructor(paths: readonly string[] = DEFAULT_AMDGPU_IDS_PATHS, backend = 'amd') {
    this.paths = paths;
    this.backend = backend;
  }

  /**
   * Loads the table on first call; every later or concurrent call shares
   * the same result
   */
  load(): Promise<GpuIdLoadResult> {
    if (!this.loading) {
      this.loading = this.readFirstAvailable().then((result) => {
        this.loaded = result;
        return result;
      });
    }
    return this.loading;
  }

  /**
   * Looks up a name; undefined when unknown or when the table is unavailable
   */
  async lookup(deviceId: number, revisionId: number): Promise<string | undefined> {
    const { ids } = await this.load();
    return ids?.get(idKey(deviceId, revisionId));
  }

  /** Whether a load has completed and found no table */
  isUnavailable(): boolean {
    return this.loaded?.error !== undefined;
  }

  private async readFirstAvailable(): Promise<GpuIdLoadResult> {
    let lastError: unknown;
    for (const path of this.paths) {
      let text: string;
      try {
        text = await readFile(path, 'utf8');
      } catch (error) {
        lastError = error;
        continue;
      }
      const ids = parseAmdGpuIds(text);
      log.debug('GPU ID table loaded', { path, entries: ids.size });
      return { ids };
    }
    log.debug('GPU ID table unavailable, using generic labels', { paths: this.paths });
    return { error: new ResolverUnavailableError(this.backend, this.paths, { cause: lastError }) };
  }
}

/** Shared resolver for the system libdrm table */
export const defaultGpuIdResolver = new GpuIdResolver();
