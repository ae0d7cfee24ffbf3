import { Observation } from '../../detections/observation';

export const ADAPTER_GATEWAY = Symbol('ADAPTER_GATEWAY');

/**
 * Boundary to the platform radio stack. `scan` blocks for roughly
 * `durationSeconds` and resolves with one observation per device seen, or
 * rejects with an AdapterError.
 */
export interface AdapterGateway {
  readonly name: string;
  scan(durationSeconds: number): Promise<Observation[]>;
}
