import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  OnApplicationBootstrap
} from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { AdapterError, describeError, PersistenceError } from '../../common/errors';
import { runWithLogContext } from '../../common/logging/log-context';
import { logError, logInfo, logWarn } from '../../common/logging/structured-logger';
import { readBooleanEnv } from '../../config/env';
import { DetectionStore } from '../detections/detection.store';
import { Observation } from '../detections/observation';
import { ScanConfigStore } from '../scan-config/scan-config.store';
import { ADAPTER_GATEWAY, AdapterGateway } from './adapter/adapter-gateway';
import { computeBackoffSeconds } from './backoff';

export type SchedulerState = 'idle' | 'scanning' | 'persisting' | 'sleeping' | 'stopped';

export type SchedulerStatus = {
  state: SchedulerState;
  running: boolean;
  cycles: number;
  consecutiveFailures: number;
  lastCycleAt: Date | null;
  lastSuccessAt: Date | null;
  lastBatchSize: number | null;
  lastError: string | null;
};

/**
 * Drives the scan loop: scan, persist the batch, sleep, repeat. Failed scans
 * back off exponentially; nothing that goes wrong inside a cycle ends the
 * loop, only `stop()` does.
 */
@Injectable()
export class ScanScheduler implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private state: SchedulerState = 'stopped';
  private loop: Promise<void> | null = null;
  private stopController: AbortController | null = null;
  private cycles = 0;
  private consecutiveFailures = 0;
  private lastCycleAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private lastBatchSize: number | null = null;
  private lastError: string | null = null;

  constructor(
    @Inject(ADAPTER_GATEWAY) private readonly gateway: AdapterGateway,
    private readonly detections: DetectionStore,
    private readonly configStore: ScanConfigStore
  ) {}

  onApplicationBootstrap(): void {
    if (!readBooleanEnv('SCANNER_ENABLED', true)) {
      logInfo('scanner.disabled', {});
      return;
    }
    this.start();
  }

  async beforeApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.stopController = controller;
    this.state = 'idle';
    logInfo('scanner.started', { adapter: this.gateway.name });
    this.loop = this.run(controller.signal)
      .catch((error: unknown) => {
        logError('scanner.loop_crashed', { error });
      })
      .finally(() => {
        this.state = 'stopped';
        this.loop = null;
        this.stopController = null;
        logInfo('scanner.stopped', { cycles: this.cycles });
      });
  }

  /**
   * Resolves once the loop has exited. A cycle already scanning or persisting
   * completes first; a pending sleep is cut short.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }
    this.stopController?.abort();
    await loop;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      running: this.loop !== null,
      cycles: this.cycles,
      consecutiveFailures: this.consecutiveFailures,
      lastCycleAt: this.lastCycleAt,
      lastSuccessAt: this.lastSuccessAt,
      lastBatchSize: this.lastBatchSize,
      lastError: this.lastError
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.cycles += 1;
      const sleepSeconds = await runWithLogContext({ cycle: this.cycles }, () => this.runCycle());
      if (signal.aborted) {
        break;
      }
      this.state = 'sleeping';
      try {
        await sleep(sleepSeconds * 1000, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
      this.state = 'idle';
    }
  }

  /**
   * One scan-and-persist cycle. Resolves with the number of seconds to sleep
   * before the next one.
   */
  private async runCycle(): Promise<number> {
    const config = this.configStore.get();
    this.state = 'scanning';
    this.lastCycleAt = new Date();

    let observations: Observation[];
    try {
      observations = await this.gateway.scan(config.scan_duration);
    } catch (error) {
      this.consecutiveFailures += 1;
      this.lastError = describeError(error);
      const backoffSeconds = computeBackoffSeconds(config.sleep_duration, this.consecutiveFailures);
      logWarn('scanner.scan_failed', {
        reason: error instanceof AdapterError ? error.reason : 'unknown',
        error,
        consecutiveFailures: this.consecutiveFailures,
        backoffSeconds
      });
      return backoffSeconds;
    }

    this.consecutiveFailures = 0;
    this.lastSuccessAt = new Date();
    this.lastBatchSize = observations.length;

    if (observations.length > 0) {
      this.state = 'persisting';
      try {
        await this.detections.appendBatch(observations);
        this.lastError = null;
      } catch (error) {
        this.lastError = describeError(error);
        const fields = { error, batchSize: observations.length };
        if (error instanceof PersistenceError) {
          logError('scanner.batch_dropped', fields);
        } else {
          logError('scanner.persist_failed', fields);
        }
        return config.sleep_duration;
      }
    } else {
      this.lastError = null;
    }

    logInfo('scanner.cycle_completed', { devices: observations.length });
    return config.sleep_duration;
  }
}
