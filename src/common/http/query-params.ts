import { BadRequestException } from '@nestjs/common';

export type QueryValue = string | string[] | undefined;

export function getSingleValue(value: QueryValue, name: string): string | undefined {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return undefined;
    }
    if (value.length > 1) {
      throw new BadRequestException(`Multiple values provided for ${name}`);
    }
    return requireString(value[0], name);
  }
  return requireString(value, name);
}

// Nested query syntax (`a[b]=c`) parses to objects; only plain strings are accepted.
function requireString(value: unknown, name: string): string | undefined {
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new BadRequestException(`${name} must be a single value`);
}

/**
 * Parses an optional bounded integer. Empty or absent values give
 * `defaultValue`.
 */
export function parseIntegerParam(
  value: QueryValue,
  name: string,
  bounds: { min: number; max?: number },
  defaultValue: number
): number;
export function parseIntegerParam(
  value: QueryValue,
  name: string,
  bounds: { min: number; max?: number }
): number | undefined;
export function parseIntegerParam(
  value: QueryValue,
  name: string,
  bounds: { min: number; max?: number },
  defaultValue?: number
): number | undefined {
  const raw = getSingleValue(value, name)?.trim();
  if (!raw) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new BadRequestException(`${name} must be an integer`);
  }
  const parsed = Number.parseInt(raw, 10);
  if (parsed < bounds.min || (bounds.max !== undefined && parsed > bounds.max)) {
    const range = bounds.max !== undefined ? `${bounds.min}..${bounds.max}` : `>= ${bounds.min}`;
    throw new BadRequestException(`${name} must be ${range}`);
  }
  return parsed;
}

const ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parses an optional ISO-8601 date or date-time. Bare dates are UTC
 * midnight; date-times without an offset are local time.
 */
export function parseDateParam(value: QueryValue, name: string): Date | undefined {
  const raw = getSingleValue(value, name)?.trim();
  if (!raw) {
    return undefined;
  }
  const parsed = ISO_TIMESTAMP.test(raw) ? new Date(raw) : null;
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new BadRequestException(`Invalid ${name} timestamp`);
  }
  return parsed;
}
