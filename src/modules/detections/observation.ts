export type Observation = {
  address: string;
  name: string | null;
  rssi: number;
  seenAt: Date;
};

export type ObservationView = {
  address: string;
  name: string | null;
  rssi: number;
  timestamp: string;
};

export type DetectionRow = {
  id: number;
  address: string;
  name: string | null;
  rssi: number;
  seen_at: number;
};

/**
 * Hardware addresses are compared case-insensitively; the upper-cased form
 * is the stored identity.
 */
export function normalizeAddress(address: string): string {
  return address.trim().toUpperCase();
}

export function normalizeName(name: string | null | undefined): string | null {
  if (typeof name !== 'string') {
    return null;
  }
  const trimmed = name.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function rowToObservation(row: DetectionRow): Observation {
  return {
    address: row.address,
    name: row.name,
    rssi: row.rssi,
    seenAt: new Date(row.seen_at)
  };
}

export function toObservationView(observation: Observation): ObservationView {
  return {
    address: observation.address,
    name: observation.name,
    rssi: observation.rssi,
    timestamp: observation.seenAt.toISOString()
  };
}
