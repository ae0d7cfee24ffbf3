import { OnApplicationShutdown } from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { logInfo } from '../common/logging/structured-logger';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS device_scans (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    address TEXT NOT NULL,
    name TEXT,
    rssi INTEGER NOT NULL,
    seen_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_device_scans_seen_at ON device_scans(seen_at);
  CREATE INDEX IF NOT EXISTS idx_device_scans_address ON device_scans(address);
`;

/**
 * Owns the SQLite file behind the detection log: one writer connection, one
 * shared reader connection, and short-lived snapshot connections for streams.
 */
export class DatabaseService implements OnApplicationShutdown {
  private readonly snapshots = new Set<Database.Database>();

  private constructor(
    readonly filename: string,
    readonly writer: Database.Database,
    readonly reader: Database.Database
  ) {}

  /**
   * Opens (creating if needed) the database at `path`. Throws if the file
   * cannot be opened; callers treat that as fatal.
   */
  static open(path: string): DatabaseService {
    const filename = resolve(path);
    mkdirSync(dirname(filename), { recursive: true });

    const writer = new Database(filename);
    try {
      writer.pragma('journal_mode = WAL');
      writer.pragma('synchronous = NORMAL');
      writer.pragma('busy_timeout = 5000');
      writer.exec(SCHEMA);
    } catch (error) {
      writer.close();
      throw error;
    }

    const reader = openReadOnly(filename);
    logInfo('database.opened', { filename });
    return new DatabaseService(filename, writer, reader);
  }

  /**
   * A dedicated read-only connection. Its first read pins a WAL snapshot that
   * stays stable until the statement finishes. Release with `closeSnapshot`.
   */
  openSnapshot(): Database.Database {
    const connection = openReadOnly(this.filename);
    this.snapshots.add(connection);
    return connection;
  }

  closeSnapshot(connection: Database.Database): void {
    if (this.snapshots.delete(connection) && connection.open) {
      connection.close();
    }
  }

  close(): void {
    for (const connection of this.snapshots) {
      if (connection.open) {
        connection.close();
      }
    }
    this.snapshots.clear();
    if (this.reader.open) {
      this.reader.close();
    }
    if (this.writer.open) {
      this.writer.close();
    }
  }

  // Runs after the scheduler's beforeApplicationShutdown has drained its cycle.
  onApplicationShutdown(): void {
    this.close();
  }
}

function openReadOnly(filename: string): Database.Database {
  const connection = new Database(filename, { readonly: true, fileMustExist: true });
  connection.pragma('busy_timeout = 5000');
  return connection;
}
