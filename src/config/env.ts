export const DEFAULT_CONFIG_PATH = 'config.json';

export type ScanAdapterKind = 'bluetoothctl' | 'simulated';

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env.BTWATCH_CONFIG;
  if (!raw || raw.trim().length === 0) {
    return DEFAULT_CONFIG_PATH;
  }
  return raw.trim();
}

export function resolveScanAdapter(env: NodeJS.ProcessEnv = process.env): ScanAdapterKind {
  const raw = env.SCAN_ADAPTER?.trim().toLowerCase();
  if (!raw || raw === 'bluetoothctl') {
    return 'bluetoothctl';
  }
  if (raw === 'simulated') {
    return raw;
  }
  throw new Error(`SCAN_ADAPTER must be one of: bluetoothctl, simulated (got "${env.SCAN_ADAPTER}")`);
}

export function readStringEnv(name: string, defaultValue: string): string {
  const raw = process.env[name];
  if (!raw || raw.trim().length === 0) {
    return defaultValue;
  }
  return raw.trim();
}

export function readBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }
  throw new Error(`${name} must be a boolean-like value (got "${raw}")`);
}
