import { setTimeout as delay } from 'timers/promises';
import { Observation } from '../../detections/observation';
import { AdapterGateway } from './adapter-gateway';

export type SimulatedDevice = {
  address: string;
  name: string | null;
  /** Chance of being seen in any one scan, 0..1. */
  presence: number;
  baseRssi: number;
};

export const SIMULATED_ROSTER: readonly SimulatedDevice[] = [
  { address: 'AA:BB:CC:00:00:01', name: 'Kitchen Speaker', presence: 0.95, baseRssi: -48 },
  { address: 'AA:BB:CC:00:00:02', name: 'Phone', presence: 0.8, baseRssi: -60 },
  { address: 'AA:BB:CC:00:00:03', name: 'Fitness Band', presence: 0.55, baseRssi: -72 },
  { address: 'AA:BB:CC:00:00:04', name: null, presence: 0.35, baseRssi: -85 },
  { address: 'AA:BB:CC:00:00:05', name: 'Headphones', presence: 0.2, baseRssi: -66 },
  { address: 'AA:BB:CC:00:00:06', name: null, presence: 0.1, baseRssi: -91 }
];

const RSSI_JITTER = 6;

export type SimulatedGatewayOptions = {
  roster?: readonly SimulatedDevice[];
  random?: () => number;
  /** Wait out the scan duration like a real radio would. */
  realtime?: boolean;
};

/**
 * Stand-in radio for hosts without Bluetooth: a fixed roster that comes and
 * goes at random with jittered signal strength.
 */
export class SimulatedAdapterGateway implements AdapterGateway {
  readonly name = 'simulated';
  private readonly roster: readonly SimulatedDevice[];
  private readonly random: () => number;
  private readonly realtime: boolean;

  constructor(options: SimulatedGatewayOptions = {}) {
    this.roster = options.roster ?? SIMULATED_ROSTER;
    this.random = options.random ?? Math.random;
    this.realtime = options.realtime ?? true;
  }

  async scan(durationSeconds: number): Promise<Observation[]> {
    if (this.realtime) {
      await delay(durationSeconds * 1000);
    }
    const seenAt = new Date();
    return this.roster
      .filter((device) => this.random() < device.presence)
      .map((device) => ({
        address: device.address,
        name: device.name,
        rssi: Math.round(device.baseRssi + (this.random() * 2 - 1) * RSSI_JITTER),
        seenAt
      }));
  }
}
