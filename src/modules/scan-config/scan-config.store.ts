import { existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { Mutex } from '../../common/concurrency/mutex';
import { PersistenceError, ValidationError } from '../../common/errors';
import { writeFileAtomic, writeFileAtomicSync } from '../../common/fs/atomic-write';
import { logInfo, logWarn } from '../../common/logging/structured-logger';
import {
  DEFAULT_SCAN_CONFIG,
  issueDetails,
  issueFields,
  RESTART_REQUIRED_FIELDS,
  ScanConfig,
  scanConfigPatchSchema,
  scanConfigSchema
} from './scan-config.schema';

const SCAN_CONFIG_FIELDS = scanConfigSchema.keyof().options;

export type RestartRequiredField = (typeof RESTART_REQUIRED_FIELDS)[number];

export type ScanConfigUpdateResult = {
  config: ScanConfig;
  requires_restart: RestartRequiredField[];
};

/**
 * Holds the live scan configuration. Readers get frozen snapshots; updates are
 * validated as a whole, persisted, and only then swapped in.
 */
export class ScanConfigStore {
  private current: Readonly<ScanConfig>;
  private readonly updateLock = new Mutex();

  private constructor(
    readonly path: string,
    initial: ScanConfig
  ) {
    this.current = Object.freeze({ ...initial });
  }

  /**
   * Loads the record at `path`, creating it with defaults when absent. A
   * record that exists but cannot be read or validated is a startup error.
   */
  static open(path: string): ScanConfigStore {
    if (!existsSync(path)) {
      const defaults = { ...DEFAULT_SCAN_CONFIG };
      mkdirSync(dirname(path), { recursive: true });
      writeFileAtomicSync(path, serialize(defaults));
      logInfo('config.created', { path });
      return new ScanConfigStore(path, defaults);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new Error(`Configuration at ${path} is not valid JSON`, { cause: error });
    }
    if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
      throw new Error(`Configuration at ${path} must be a JSON object`);
    }

    const known: Record<string, unknown> = {};
    const ignored: string[] = [];
    for (const [key, value] of Object.entries(raw)) {
      if (key in DEFAULT_SCAN_CONFIG) {
        known[key] = value;
      } else {
        ignored.push(key);
      }
    }
    if (ignored.length > 0) {
      logWarn('config.unknown_fields_ignored', { path, fields: ignored });
    }

    const parsed = scanConfigSchema.safeParse({ ...DEFAULT_SCAN_CONFIG, ...known });
    if (!parsed.success) {
      throw new Error(
        `Configuration at ${path} is invalid: ${issueDetails(parsed.error).join('; ')}`
      );
    }
    logInfo('config.loaded', { path });
    return new ScanConfigStore(path, parsed.data);
  }

  get(): Readonly<ScanConfig> {
    return this.current;
  }

  /**
   * Applies a partial update. Any invalid or unknown field rejects the whole
   * patch with a ValidationError and leaves both memory and disk untouched.
   */
  async update(patch: unknown): Promise<ScanConfigUpdateResult> {
    return this.updateLock.runExclusive(async () => {
      const parsed = scanConfigPatchSchema.safeParse(dropUndefined(patch));
      if (!parsed.success) {
        throw new ValidationError(issueFields(parsed.error), issueDetails(parsed.error));
      }

      const previous = this.current;
      const next: ScanConfig = { ...previous, ...parsed.data };

      try {
        await writeFileAtomic(this.path, serialize(next));
      } catch (error) {
        throw new PersistenceError(`Could not write configuration to ${this.path}`, {
          cause: error
        });
      }
      this.current = Object.freeze(next);

      const changed = SCAN_CONFIG_FIELDS.filter((key) => next[key] !== previous[key]);
      const requiresRestart = RESTART_REQUIRED_FIELDS.filter((field) => changed.includes(field));
      logInfo('config.updated', { path: this.path, changed, requiresRestart });

      return { config: this.current, requires_restart: requiresRestart };
    });
  }
}

function dropUndefined(patch: unknown): unknown {
  if (!patch || typeof patch !== 'object' || Array.isArray(patch)) {
    return patch;
  }
  return Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
}

function serialize(config: ScanConfig): string {
  return `${JSON.stringify(config, null, 2)}\n`;
}
