/**
 * Device Configuration
 *
 * Validation and typed accessors over the flat `vars` mapping supplied by
 * the configuration layer: enable flags and refresh-interval durations.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { formatError } from '../../logging/subsystem.js';
import type { BackendToggle, DeviceVars } from '../types/device-vars.js';

export const DEFAULT_REFRESH_MS = 1000;

/** Longest delay Node timers honour; larger ones fire after 1ms */
export const MAX_REFRESH_MS = 2_147_483_647;

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Parses a duration such as "2s", "500ms" or "1m30s" into milliseconds.
 * A bare "0" is accepted; any other unitless number is rejected.
 */
export function parseDuration(text: string): number {
  let input = text.trim();
  let sign = 1;
  if (input.startsWith('-') || input.startsWith('+')) {
    sign = input.startsWith('-') ? -1 : 1;
    input = input.slice(1);
  }
  if (input === '0') {
    return 0;
  }
  if (input === '') {
    throw new ConfigError(`invalid duration "${text}"`);
  }

  let total = 0;
  DURATION_SEGMENT.lastIndex = 0;
  while (DURATION_SEGMENT.lastIndex < input.length) {
    const match = DURATION_SEGMENT.exec(input);
    if (!match) {
      throw new ConfigError(`invalid duration "${text}"`);
    }
    const [, amount = '', unit = ''] = match;
    const scale = UNIT_MS[unit];
    if (scale === undefined) {
      throw new ConfigError(`unknown unit "${unit}" in duration "${text}"`);
    }
    total += Number.parseFloat(amount) * scale;
  }
  return sign * total;
}

export const DurationSchema = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: formatError(error) });
    return z.NEVER;
  }
});

export const DeviceVarsSchema = z.record(z.string(), z.string());

/**
 * Validates an arbitrary value as a string-to-string vars mapping
 */
export function resolveDeviceVars(input: unknown): DeviceVars {
  const result = DeviceVarsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ConfigError(`invalid device vars${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

/**
 * Builds vars from `key=value` pairs; later pairs override earlier ones
 */
export function parseDeviceVars(pairs: readonly string[]): DeviceVars {
  const vars: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator > 0 ? pair.slice(0, separator).trim() : '';
    if (key === '') {
      throw new ConfigError(`expected key=value, got "${pair}"`);
    }
    vars[key] = pair.slice(separator + 1).trim();
  }
  return resolveDeviceVars(vars);
}

/**
 * Reads a backend's enable flags. Any key set to "true" wins over any key
 * set to "false"; neither means the backend decides by auto-detection.
 */
export function readToggle(vars: DeviceVars, keys: readonly string[]): BackendToggle {
  if (keys.some((key) => vars[key] === 'true')) {
    return 'enabled';
  }
  if (keys.some((key) => vars[key] === 'false')) {
    return 'disabled';
  }
  return 'auto';
}

/**
 * Reads a refresh interval in milliseconds, falling back when unset
 */
export function readRefreshInterval(vars: DeviceVars, key: string, fallbackMs: number = DEFAULT_REFRESH_MS): number {
  const raw = vars[key];
  if (raw === undefined) {
    return fallbackMs;
  }
  const parsed = DurationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid ${key}: ${parsed.error.issues[0]?.message ?? raw}`, key);
  }
  if (parsed.data <= 0) {
    throw new ConfigError(`${key} must be positive, got "${raw}"`, key);
  }
  if (parsed.data > MAX_REFRESH_MS) {
    throw new ConfigError(`${key} must be at most ${MAX_REFRESH_MS}ms, got "${raw}"`, key);
  }
  return parsed.data;
}
