type RequestLike = {
  query?: unknown;
  body?: unknown;
};

export type RequestLogContext = {
  hours?: string;
  limit?: string;
  configFields?: string[];
};

/**
 * Query and body fields worth repeating on the request's log line.
 */
export function extractRequestLogContext(request: RequestLike): RequestLogContext {
  const context: RequestLogContext = {};
  if (isRecord(request.query)) {
    const hours = pickString(request.query, 'hours');
    const limit = pickString(request.query, 'limit');
    if (hours !== undefined) {
      context.hours = hours;
    }
    if (limit !== undefined) {
      context.limit = limit;
    }
  }
  if (isRecord(request.body) && Object.keys(request.body).length > 0) {
    context.configFields = Object.keys(request.body).sort();
  }
  return context;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
