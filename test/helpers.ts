import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AdapterGateway } from '../src/modules/scanner/adapter/adapter-gateway';
import { Observation } from '../src/modules/detections/observation';

export function createTempDir(prefix = 'btwatch-test-'): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  };
}

export function observation(
  address: string,
  seenAtMs: number,
  overrides: Partial<Omit<Observation, 'address' | 'seenAt'>> = {}
): Observation {
  return {
    address,
    name: overrides.name ?? null,
    rssi: overrides.rssi ?? -60,
    seenAt: new Date(seenAtMs)
  };
}

type ScanStep = Observation[] | Error | (() => Promise<Observation[]>);

/**
 * Gateway that replays scripted scan results in order, then keeps returning
 * empty scans.
 */
export class ScriptedGateway implements AdapterGateway {
  readonly name = 'scripted';
  readonly durations: number[] = [];
  private readonly steps: ScanStep[];

  constructor(steps: ScanStep[] = []) {
    this.steps = [...steps];
  }

  get calls(): number {
    return this.durations.length;
  }

  async scan(durationSeconds: number): Promise<Observation[]> {
    this.durations.push(durationSeconds);
    const step = this.steps.shift();
    if (step === undefined) {
      return [];
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step();
    }
    return step;
  }
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2000,
  intervalMs = 5
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
