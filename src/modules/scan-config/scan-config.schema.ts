import { z } from 'zod';

const positiveSeconds = z.number().finite().positive();

export const scanConfigSchema = z
  .object({
    scan_duration: positiveSeconds,
    scan_interval: positiveSeconds,
    sleep_duration: positiveSeconds,
    session_gap_multiplier: z.number().finite().positive(),
    db_path: z.string().trim().min(1),
    host: z.string().trim().min(1),
    port: z.number().int().min(1).max(65535)
  })
  .strict();

export type ScanConfig = z.output<typeof scanConfigSchema>;

export const scanConfigPatchSchema = scanConfigSchema.partial().strict();

export const DEFAULT_SCAN_CONFIG: Readonly<ScanConfig> = Object.freeze({
  scan_duration: 5,
  scan_interval: 3,
  sleep_duration: 1,
  session_gap_multiplier: 2,
  db_path: 'btwatch.sqlite',
  host: '0.0.0.0',
  port: 8080
});

/**
 * Fields read once at process start; changing them only takes effect after a
 * restart.
 */
export const RESTART_REQUIRED_FIELDS = ['db_path', 'host', 'port'] as const;

/**
 * Largest gap between two detections of one device that still counts as the
 * same presence session.
 */
export function sessionGapSeconds(config: ScanConfig): number {
  return config.scan_interval * config.session_gap_multiplier;
}

export function issueFields(error: z.ZodError): string[] {
  const fields: string[] = [];
  for (const issue of error.issues) {
    if (issue.code === 'unrecognized_keys') {
      fields.push(...issue.keys);
      continue;
    }
    const field = issue.path[0];
    fields.push(field === undefined ? '(root)' : String(field));
  }
  return fields;
}

export function issueDetails(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `${field}: ${issue.message}`;
  });
}
