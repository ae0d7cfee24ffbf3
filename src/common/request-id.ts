import { randomUUID } from 'crypto';

export const REQUEST_ID_HEADER = 'X-Request-Id';
const REQUEST_ID_HEADER_LOWER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[\x21-\x7e]+$/;

type HeaderValue = string | string[] | undefined;

type RequestWithRequestId = {
  headers?: Record<string, HeaderValue>;
  requestId?: string;
};

/**
 * Accepts a caller-supplied id only if it is short printable ASCII, so it can
 * be echoed into headers and log lines unchanged.
 */
export function normalizeRequestId(value: HeaderValue): string | null {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== 'string') {
    return null;
  }
  const trimmed = raw.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH || !REQUEST_ID_PATTERN.test(trimmed)) {
    return null;
  }
  return trimmed;
}

export function ensureRequestId(request: RequestWithRequestId): string {
  if (typeof request.requestId === 'string' && request.requestId.length > 0) {
    return request.requestId;
  }

  const requestId = normalizeRequestId(request.headers?.[REQUEST_ID_HEADER_LOWER]) ?? randomUUID();
  request.requestId = requestId;
  return requestId;
}
