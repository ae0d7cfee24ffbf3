import { Injectable } from '@nestjs/common';
import type Database from 'better-sqlite3';
import { Mutex } from '../../common/concurrency/mutex';
import { describeError, ExportError, PersistenceError } from '../../common/errors';
import { logDebug } from '../../common/logging/structured-logger';
import { DatabaseService } from '../../database/database.service';
import {
  DetectionRow,
  normalizeAddress,
  normalizeName,
  Observation,
  rowToObservation
} from './observation';
import { mergeSessions } from './timeline';

const HOUR_MS = 60 * 60 * 1000;
const RANGE_MIN = Number.MIN_SAFE_INTEGER;
const RANGE_MAX = Number.MAX_SAFE_INTEGER;

export const DEFAULT_TOP_DEVICES = 5;

export type DetectionSummary = {
  total_records: number;
  unique_devices: number;
  top_devices: Array<{ address: string; count: number }>;
  first_seen: string | null;
  last_seen: string | null;
};

export type TimelineSession = {
  first_seen: string;
  last_seen: string;
  detections: number;
};

export type TimelineDevice = {
  address: string;
  name: string | null;
  detections: number;
  sessions: TimelineSession[];
};

export type Timeline = {
  hours: number;
  gap_seconds: number;
  devices: TimelineDevice[];
};

/**
 * Either the half-open interval [since, until) when one of them is given, or
 * the trailing `hours` before `now` (0 or absent: all time).
 */
export type ExportRange = {
  hours?: number;
  now?: Date;
  since?: Date;
  until?: Date;
};

export type ExportStats = {
  total_records: number;
  start_time: string | null;
  end_time: string | null;
  duration: string;
};

export type ClearResult = {
  records_before: number;
  records_deleted: number;
  success: true;
};

type TotalsRow = {
  total_records: number;
  unique_devices: number;
  first_seen: number | null;
  last_seen: number | null;
};

type RangeStatsRow = {
  total_records: number;
  first_seen: number | null;
  last_seen: number | null;
};

/**
 * Append-mostly log of device detections.
 *
 * Writes (`appendBatch`, `clearAll`) are serialized by a mutex and each runs
 * as one SQLite transaction on the writer connection. Reads never take the
 * mutex: they go through a separate connection and see the last committed
 * state, so a reader can never observe half of a batch.
 */
@Injectable()
export class DetectionStore {
  private readonly writeLock = new Mutex();
  private readonly insertStatement: Database.Statement<[string, string | null, number, number]>;

  constructor(private readonly database: DatabaseService) {
    this.insertStatement = database.writer.prepare<[string, string | null, number, number]>(
      'INSERT INTO device_scans (address, name, rssi, seen_at) VALUES (?, ?, ?, ?)'
    );
  }

  /**
   * Commits every observation of one scan cycle atomically. Resolves with
   * the number of rows written.
   */
  async appendBatch(observations: readonly Observation[]): Promise<number> {
    const rows = observations.map(toInsertParams);
    if (rows.length === 0) {
      return 0;
    }

    return this.writeLock.runExclusive(() => {
      try {
        const insertAll = this.database.writer.transaction(
          (batch: Array<[string, string | null, number, number]>) => {
            for (const params of batch) {
              this.insertStatement.run(...params);
            }
          }
        );
        insertAll(rows);
      } catch (error) {
        throw new PersistenceError(`Failed to append batch of ${rows.length}: ${describeError(error)}`, {
          cause: error
        });
      }
      logDebug('detections.batch_committed', { size: rows.length });
      return rows.length;
    });
  }

  queryRecent(limit: number): Observation[] {
    assertPositiveInteger(limit, 'limit');
    return this.read('queryRecent', (reader) =>
      reader
        .prepare<[number], DetectionRow>(
          `SELECT id, address, name, rssi, seen_at FROM device_scans
           ORDER BY seen_at DESC, id DESC
           LIMIT ?`
        )
        .all(limit)
        .map(rowToObservation)
    );
  }

  querySummary(top: number = DEFAULT_TOP_DEVICES): DetectionSummary {
    if (!Number.isInteger(top) || top < 0) {
      throw new RangeError('top must be a non-negative integer');
    }
    return this.read('querySummary', (reader) =>
      reader.transaction(() => {
        const totals = reader
          .prepare<[], TotalsRow>(
            `SELECT
               COUNT(*) AS total_records,
               COUNT(DISTINCT address) AS unique_devices,
               MIN(seen_at) AS first_seen,
               MAX(seen_at) AS last_seen
             FROM device_scans`
          )
          .get();
        const topDevices = reader
          .prepare<[number], { address: string; count: number }>(
            `SELECT address, COUNT(*) AS count FROM device_scans
             GROUP BY address
             ORDER BY count DESC, address ASC
             LIMIT ?`
          )
          .all(top);

        return {
          total_records: totals?.total_records ?? 0,
          unique_devices: totals?.unique_devices ?? 0,
          top_devices: topDevices,
          first_seen: toIso(totals?.first_seen ?? null),
          last_seen: toIso(totals?.last_seen ?? null)
        };
      })()
    );
  }

  /**
   * Groups the window's detections by address and merges each device's
   * detections into presence sessions in one pass over rows sorted by
   * (address, seen_at).
   */
  queryTimeline(options: { hours?: number; gapSeconds: number; now?: Date }): Timeline {
    const hours = options.hours ?? 0;
    assertNonNegativeInteger(hours, 'hours');
    if (!Number.isFinite(options.gapSeconds) || options.gapSeconds < 0) {
      throw new RangeError('gapSeconds must be a non-negative number');
    }
    const gapMs = options.gapSeconds * 1000;
    const since = hours > 0 ? (options.now ?? new Date()).getTime() - hours * HOUR_MS : RANGE_MIN;

    return this.read('queryTimeline', (reader) => {
      const rows = reader
        .prepare<[number], Pick<DetectionRow, 'address' | 'name' | 'seen_at'>>(
          `SELECT address, name, seen_at FROM device_scans
           WHERE seen_at >= ?
           ORDER BY address ASC, seen_at ASC, id ASC`
        )
        .iterate(since);

      const devices: TimelineDevice[] = [];
      let address: string | null = null;
      let name: string | null = null;
      let timestamps: number[] = [];

      const flush = (): void => {
        if (address === null) {
          return;
        }
        const sessions = mergeSessions(timestamps, gapMs).map((session) => ({
          first_seen: new Date(session.firstSeen).toISOString(),
          last_seen: new Date(session.lastSeen).toISOString(),
          detections: session.detections
        }));
        devices.push({ address, name, detections: timestamps.length, sessions });
      };

      for (const row of rows) {
        if (row.address !== address) {
          flush();
          address = row.address;
          name = null;
          timestamps = [];
        }
        timestamps.push(row.seen_at);
        if (row.name !== null) {
          name = row.name;
        }
      }
      flush();

      return { hours, gap_seconds: options.gapSeconds, devices };
    });
  }

  /**
   * Streams matching observations oldest first. Each call opens its own
   * snapshot connection, so the stream neither blocks writers nor sees rows
   * committed after it started; breaking out of the loop releases it.
   */
  async *export(range: ExportRange = {}): AsyncGenerator<Observation, void, undefined> {
    const { since, until } = resolveExportRange(range);
    let connection: Database.Database;
    try {
      connection = this.database.openSnapshot();
    } catch (error) {
      throw new ExportError(`Could not open export snapshot: ${describeError(error)}`, {
        cause: error
      });
    }

    let rows: IterableIterator<DetectionRow> | null = null;
    try {
      rows = connection
        .prepare<[number, number], DetectionRow>(
          `SELECT id, address, name, rssi, seen_at FROM device_scans
           WHERE seen_at >= ? AND seen_at < ?
           ORDER BY seen_at ASC, id ASC`
        )
        .iterate(since, until);

      for (;;) {
        let next: IteratorResult<DetectionRow>;
        try {
          next = rows.next();
        } catch (error) {
          throw new ExportError(`Export interrupted: ${describeError(error)}`, { cause: error });
        }
        if (next.done) {
          break;
        }
        yield rowToObservation(next.value);
      }
    } catch (error) {
      if (error instanceof ExportError) {
        throw error;
      }
      throw new ExportError(`Export failed: ${describeError(error)}`, { cause: error });
    } finally {
      rows?.return?.();
      this.database.closeSnapshot(connection);
    }
  }

  exportStats(hours?: number, now: Date = new Date()): ExportStats {
    if (hours !== undefined) {
      assertNonNegativeInteger(hours, 'hours');
    }
    const windowed = hours !== undefined && hours > 0;
    const since = windowed ? now.getTime() - hours * HOUR_MS : RANGE_MIN;

    return this.read('exportStats', (reader) => {
      const stats = reader
        .prepare<[number], RangeStatsRow>(
          `SELECT COUNT(*) AS total_records, MIN(seen_at) AS first_seen, MAX(seen_at) AS last_seen
           FROM device_scans
           WHERE seen_at >= ?`
        )
        .get(since);

      return {
        total_records: stats?.total_records ?? 0,
        start_time: toIso(stats?.first_seen ?? null),
        end_time: toIso(stats?.last_seen ?? null),
        duration: windowed ? `Last ${hours} hours` : 'All time'
      };
    });
  }

  /**
   * Deletes the whole log in one transaction. Runs strictly before or after
   * any batch append.
   */
  async clearAll(): Promise<ClearResult> {
    return this.writeLock.runExclusive(() => {
      try {
        const writer = this.database.writer;
        return writer.transaction((): ClearResult => {
          const before = writer
            .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM device_scans')
            .get();
          const deleted = writer.prepare('DELETE FROM device_scans').run();
          return {
            records_before: before?.count ?? 0,
            records_deleted: deleted.changes,
            success: true
          };
        })();
      } catch (error) {
        throw new PersistenceError(`Failed to clear detections: ${describeError(error)}`, {
          cause: error
        });
      }
    });
  }

  /**
   * Round-trip latency of a trivial read, in milliseconds.
   */
  ping(): number {
    const startedAt = process.hrtime.bigint();
    this.read('ping', (reader) => reader.prepare('SELECT 1').get());
    return Number(process.hrtime.bigint() - startedAt) / 1_000_000;
  }

  private read<T>(operation: string, query: (reader: Database.Database) => T): T {
    try {
      return query(this.database.reader);
    } catch (error) {
      throw new PersistenceError(`${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

function toInsertParams(observation: Observation): [string, string | null, number, number] {
  const address = normalizeAddress(observation.address);
  const seenAt = observation.seenAt.getTime();
  if (address.length === 0 || !Number.isFinite(observation.rssi) || !Number.isFinite(seenAt)) {
    throw new PersistenceError(`Rejected malformed observation for "${observation.address}"`);
  }
  return [address, normalizeName(observation.name), Math.round(observation.rssi), seenAt];
}

function resolveExportRange(range: ExportRange): { since: number; until: number } {
  if (range.since || range.until) {
    return {
      since: range.since?.getTime() ?? RANGE_MIN,
      until: range.until?.getTime() ?? RANGE_MAX
    };
  }
  const hours = range.hours ?? 0;
  assertNonNegativeInteger(hours, 'hours');
  if (hours === 0) {
    return { since: RANGE_MIN, until: RANGE_MAX };
  }
  return { since: (range.now ?? new Date()).getTime() - hours * HOUR_MS, until: RANGE_MAX };
}

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer`);
  }
}

function assertNonNegativeInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer`);
  }
}
