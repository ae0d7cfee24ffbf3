import { spawn, type ChildProcessByStdio } from 'child_process';
import readline from 'readline';
import type { Readable } from 'stream';
import { AdapterError, describeError } from '../../../common/errors';
import { logDebug, logWarn } from '../../../common/logging/structured-logger';
import { Observation } from '../../detections/observation';
import { AdapterGateway } from './adapter-gateway';
import { classifyFailure, ScanOutputCollector } from './bluetoothctl-parser';

type SpawnedScanChild = ChildProcessByStdio<null, Readable, Readable>;

const KILL_GRACE_MS = 5000;
const STDERR_SAMPLE_LIMIT = 280;

export type BluetoothctlGatewayOptions = {
  cliPath: string;
};

/**
 * Runs `bluetoothctl --timeout <d> scan on` once per scan.
 */
export class BluetoothctlGateway implements AdapterGateway {
  readonly name = 'bluetoothctl';

  constructor(private readonly options: BluetoothctlGatewayOptions) {}

  async scan(durationSeconds: number): Promise<Observation[]> {
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      throw new RangeError('durationSeconds must be a positive number');
    }
    const timeoutSeconds = Math.max(1, Math.ceil(durationSeconds));
    const args = ['--timeout', String(timeoutSeconds), 'scan', 'on'];
    logDebug('adapter.scan.started', { command: this.options.cliPath, args });

    let child: SpawnedScanChild;
    try {
      child = spawn(this.options.cliPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (error) {
      throw toAdapterError(error);
    }

    const collector = new ScanOutputCollector();
    const stdoutReader = consumeStreamLines(child.stdout, (line) => collector.pushStdout(line));
    const stderrReader = consumeStreamLines(child.stderr, (line) => {
      if (!collector.pushStderr(line) && line.trim()) {
        logDebug('adapter.stderr', { sample: line.trim().slice(0, STDERR_SAMPLE_LIMIT) });
      }
    });
    // Settles to the read error, if any, so a failing pipe is never left unobserved.
    const readers = Promise.all([stdoutReader, stderrReader]).then(
      () => null,
      (error: unknown) => error
    );

    const killAfterMs = timeoutSeconds * 1000 + KILL_GRACE_MS;
    let timedOut = false;
    const killTimer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, killAfterMs);

    let exit: { exitCode: number | null; signal: NodeJS.Signals | null };
    try {
      exit = await new Promise((resolve, reject) => {
        child.once('error', reject);
        child.once('exit', (code, signal) => resolve({ exitCode: code, signal }));
      });
      const readError = await readers;
      if (readError !== null) {
        throw readError;
      }
    } catch (error) {
      child.kill('SIGKILL');
      throw toAdapterError(error);
    } finally {
      clearTimeout(killTimer);
    }

    if (timedOut) {
      throw new AdapterError('timeout', `bluetoothctl did not exit within ${killAfterMs / 1000}s`);
    }
    if (collector.failure) {
      throw collector.failure;
    }
    if (exit.exitCode !== 0) {
      logWarn('adapter.scan.exit_nonzero', { exitCode: exit.exitCode, signal: exit.signal });
      throw new AdapterError(
        'unavailable',
        `bluetoothctl exited with ${exit.exitCode ?? `signal ${exit.signal ?? 'unknown'}`}`
      );
    }

    const observations = collector.observations();
    logDebug('adapter.scan.completed', { devices: observations.length });
    return observations;
  }
}

async function consumeStreamLines(
  stream: NodeJS.ReadableStream,
  onLine: (line: string) => void
): Promise<void> {
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  for await (const line of rl) {
    onLine(line);
  }
}

function toAdapterError(error: unknown): AdapterError {
  const code = errorCode(error);
  const message = describeError(error);
  if (code === 'ENOENT') {
    return new AdapterError('unavailable', `bluetoothctl not found: ${message}`, { cause: error });
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return new AdapterError('permission_denied', message, { cause: error });
  }
  return new AdapterError(classifyFailure(message) ?? 'unavailable', message, { cause: error });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
