import { AdapterError, AdapterFailureReason } from '../../../common/errors';
import { normalizeAddress, Observation } from '../../detections/observation';

const ANSI_ESCAPE = /\x1b\[[0-9;]*[A-Za-z]|[\x01\x02]/g;
const ADDRESS = '([0-9A-Fa-f]{2}(?::[0-9A-Fa-f]{2}){5})';

const NEW_DEVICE = new RegExp(`^\\[NEW\\] Device ${ADDRESS}(?: (.*))?$`);
const RSSI_CHANGE = new RegExp(
  `^\\[CHG\\] Device ${ADDRESS} RSSI: (?:0x[0-9a-fA-F]+ \\((-?\\d+)\\)|(-?\\d+))$`
);
const NAME_CHANGE = new RegExp(`^\\[CHG\\] Device ${ADDRESS} (?:Name|Alias): (.*)$`);
const DISCOVERY_STARTED = /^(Discovery started|\[CHG\] Controller \S+ Discovering: yes)$/;

export type BluetoothctlEvent =
  | { type: 'discovery_started' }
  | { type: 'device'; address: string; name?: string; rssi?: number }
  | { type: 'failure'; reason: AdapterFailureReason; message: string };

/**
 * Classifies one line of `bluetoothctl scan on` output. Lines that carry
 * nothing of interest give `null`.
 */
export function parseBluetoothctlLine(rawLine: string): BluetoothctlEvent | null {
  const line = stripPrompt(rawLine.replace(ANSI_ESCAPE, '')).trim();
  if (!line) {
    return null;
  }

  if (DISCOVERY_STARTED.test(line)) {
    return { type: 'discovery_started' };
  }

  const rssi = RSSI_CHANGE.exec(line);
  if (rssi) {
    const value = Number.parseInt(rssi[2] ?? rssi[3], 10);
    return { type: 'device', address: rssi[1], rssi: value };
  }

  const named = NAME_CHANGE.exec(line);
  if (named) {
    return { type: 'device', address: named[1], name: named[2].trim() };
  }

  const created = NEW_DEVICE.exec(line);
  if (created) {
    const name = created[2]?.trim();
    // bluetoothctl prints the address in place of the name when it has none.
    const hasName = name && name.replace(/-/g, ':').toUpperCase() !== created[1].toUpperCase();
    return { type: 'device', address: created[1], ...(hasName ? { name } : {}) };
  }

  const reason = classifyFailure(line);
  if (reason) {
    return { type: 'failure', reason, message: line };
  }
  return null;
}

export function classifyFailure(text: string): AdapterFailureReason | null {
  const lowered = text.toLowerCase();
  if (
    lowered.includes('notpermitted') ||
    lowered.includes('not permitted') ||
    lowered.includes('access denied') ||
    lowered.includes('permission denied') ||
    lowered.includes('eacces')
  ) {
    return 'permission_denied';
  }
  if (
    lowered.includes('no default controller available') ||
    lowered.includes('notready') ||
    lowered.includes('failed to start discovery') ||
    lowered.includes('waiting to connect to bluetoothd')
  ) {
    return 'unavailable';
  }
  return null;
}

function stripPrompt(line: string): string {
  // Interactive prompts such as "[bluetooth]# " may prefix event lines.
  return line.replace(/^\[[^\]]*\][#>]\s*/, '');
}

/**
 * Folds one scan's output into one observation per address, keeping the
 * latest name and RSSI seen for each. Devices printed before discovery
 * starts come from the controller cache and are skipped.
 */
export class ScanOutputCollector {
  private discovering = false;
  private readonly devices = new Map<string, Observation>();
  private firstFailure: AdapterError | null = null;

  get failure(): AdapterError | null {
    return this.firstFailure;
  }

  pushStdout(line: string, at: Date = new Date()): void {
    const event = parseBluetoothctlLine(line);
    if (!event) {
      return;
    }
    switch (event.type) {
      case 'discovery_started':
        this.discovering = true;
        return;
      case 'failure':
        this.recordFailure(event.reason, event.message);
        return;
      case 'device': {
        if (!this.discovering) {
          return;
        }
        const address = normalizeAddress(event.address);
        const known = this.devices.get(address);
        this.devices.set(address, {
          address,
          name: event.name ?? known?.name ?? null,
          rssi: event.rssi ?? known?.rssi ?? 0,
          seenAt: at
        });
      }
    }
  }

  /**
   * Stderr carries no device events; returns whether the line was a
   * recognised failure.
   */
  pushStderr(line: string): boolean {
    const trimmed = line.trim();
    const reason = trimmed ? classifyFailure(trimmed) : null;
    if (!reason) {
      return false;
    }
    this.recordFailure(reason, trimmed);
    return true;
  }

  observations(): Observation[] {
    return [...this.devices.values()];
  }

  private recordFailure(reason: AdapterFailureReason, message: string): void {
    this.firstFailure ??= new AdapterError(reason, message);
  }
}
