/**
 * DeviceVars Type
 *
 * The resolved configuration handed to every startup function. Keys are
 * backend specific (`amd`, `amd-refresh`, ...); unknown keys are ignored.
 */

export type DeviceVars = Readonly<Record<string, string>>;

/** Result of reading a backend's enable/disable flags */
export type BackendToggle = 'enabled' | 'disabled' | 'auto';
