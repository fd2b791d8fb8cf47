/**
 * Native GPU Query Capability
 *
 * The narrow interface a platform GPU enumerator implements. Results may be
 * backed by buffers the query owns, so callers copy the fields they need and
 * always call release() afterwards, even when copying fails.
 */

/** Reported when the platform exposes no utilization counter */
export const UTILIZATION_UNAVAILABLE = -1;

export interface GpuDeviceReading {
  name: string;
  /** Bytes available to the device; host RAM for unified memory */
  totalMemory: number;
  /** Bytes allocated by the device */
  usedMemory: number;
  /** Percent busy, or UTILIZATION_UNAVAILABLE */
  utilization: number;
}

export interface GpuQueryResult {
  readonly devices: readonly GpuDeviceReading[];
  release(): void;
}

export interface GpuQuery {
  query(): Promise<GpuQueryResult>;
}

/**
 * Runs a query and returns copies of its readings, releasing the result
 * whatever happens
 */
export async function readGpuDevices(query: GpuQuery): Promise<GpuDeviceReading[]> {
  const result = await query.query();
  try {
    return result.devices.map((device) => ({ ...device }));
  } finally {
    result.release();
  }
}
