/**
 * MemoryInfo Interface
 *
 * Memory figures reported for one device in one sampling cycle.
 */

export interface MemoryInfo {
  /** Total memory available to the device in bytes */
  total: number;
  /** Memory currently in use in bytes */
  used: number;
  /** used / total * 100, never computed from a zero total */
  usedPercent: number;
}
