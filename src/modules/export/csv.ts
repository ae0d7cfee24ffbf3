import { Observation } from '../detections/observation';

export const CSV_HEADER = ['address', 'name', 'rssi', 'timestamp'] as const;

const LINE_END = '\r\n';
const NEEDS_QUOTING = /[",\r\n]/;

export function csvField(value: string | number | null): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
}

export function csvLine(fields: ReadonlyArray<string | number | null>): string {
  return fields.map(csvField).join(',') + LINE_END;
}

export function observationToCsvLine(observation: Observation): string {
  return csvLine([
    observation.address,
    observation.name,
    observation.rssi,
    observation.seenAt.toISOString()
  ]);
}

/**
 * Header line, then one line per observation: the already-fetched `head`
 * rows first, then whatever `rest` still yields.
 */
export async function* csvLines(
  head: readonly Observation[],
  rest: AsyncIterable<Observation>,
  onRow: () => void = () => undefined
): AsyncGenerator<string, void, undefined> {
  yield csvLine(CSV_HEADER);
  for (const observation of head) {
    onRow();
    yield observationToCsvLine(observation);
  }
  for await (const observation of rest) {
    onRow();
    yield observationToCsvLine(observation);
  }
}

/**
 * `btwatch_export_<all|lastNh|range>_<YYYYMMDD_HHMMSS>.csv`, stamped in UTC.
 */
export function exportFilename(scope: { hours?: number; ranged?: boolean }, now: Date): string {
  const label = scope.ranged ? 'range' : scope.hours ? `last${scope.hours}h` : 'all';
  const iso = now.toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
  return `btwatch_export_${label}_${stamp}.csv`;
}
