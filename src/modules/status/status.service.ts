import { Injectable } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';
import { logDebug } from '../../common/logging/structured-logger';
import { DetectionStore } from '../detections/detection.store';
import { ScanScheduler, SchedulerState } from '../scanner/scan-scheduler.service';

export type StatusResponse = {
  version: string;
  now: string;
  db: {
    ok: boolean;
    latencyMs?: number;
  };
  workers: {
    scanner: {
      ok: boolean;
      state: SchedulerState;
      running: boolean;
      cycles: number;
      consecutiveFailures: number;
      lastRunAt?: string;
      lastSuccessAt?: string;
      lastBatchSize?: number;
      lastError?: string;
    };
  };
  detections: {
    totalRecords: number | null;
    latestScanAt: string | null;
  };
};

@Injectable()
export class StatusService {
  private readonly version = resolveAppVersion();

  constructor(
    private readonly detections: DetectionStore,
    private readonly scheduler: ScanScheduler
  ) {}

  getStatus(): StatusResponse {
    const db = this.getDbStatus();
    const scanner = this.scheduler.getStatus();

    return {
      version: this.version,
      now: new Date().toISOString(),
      db,
      workers: {
        scanner: {
          ok: scanner.consecutiveFailures === 0 && scanner.lastError === null,
          state: scanner.state,
          running: scanner.running,
          cycles: scanner.cycles,
          consecutiveFailures: scanner.consecutiveFailures,
          lastRunAt: scanner.lastCycleAt?.toISOString(),
          lastSuccessAt: scanner.lastSuccessAt?.toISOString(),
          lastBatchSize: scanner.lastBatchSize ?? undefined,
          lastError: scanner.lastError ?? undefined
        }
      },
      detections: db.ok ? this.getDetectionTotals() : { totalRecords: null, latestScanAt: null }
    };
  }

  private getDbStatus(): { ok: boolean; latencyMs?: number } {
    try {
      const latencyMs = this.detections.ping();
      return { ok: true, latencyMs: Number(latencyMs.toFixed(2)) };
    } catch (error) {
      logDebug('status.db_unreachable', { error });
      return { ok: false };
    }
  }

  private getDetectionTotals(): StatusResponse['detections'] {
    try {
      const summary = this.detections.querySummary(0);
      return { totalRecords: summary.total_records, latestScanAt: summary.last_seen };
    } catch (error) {
      logDebug('status.totals_unavailable', { error });
      return { totalRecords: null, latestScanAt: null };
    }
  }
}

function resolveAppVersion(): string {
  if (process.env.APP_VERSION && process.env.APP_VERSION.trim().length > 0) {
    return process.env.APP_VERSION.trim();
  }

  if (process.env.npm_package_version && process.env.npm_package_version.trim().length > 0) {
    return process.env.npm_package_version.trim();
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(join(process.cwd(), 'package.json'), 'utf8'));
    if (
      raw &&
      typeof raw === 'object' &&
      'version' in raw &&
      typeof raw.version === 'string' &&
      raw.version.trim().length > 0
    ) {
      return raw.version.trim();
    }
  } catch (error) {
    logDebug('status.version_unresolved', { error });
  }

  return 'unknown';
}
