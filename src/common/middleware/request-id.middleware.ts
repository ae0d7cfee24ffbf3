import { extractRequestLogContext } from '../logging/http-log-context';
import { runWithLogContext } from '../logging/log-context';
import { logInfo } from '../logging/structured-logger';
import { ensureRequestId, REQUEST_ID_HEADER } from '../request-id';

type RequestLike = {
  method: string;
  originalUrl?: string;
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
  query?: Record<string, unknown>;
  body?: unknown;
  requestId?: string;
  requestStartedAtNs?: bigint;
};

type ResponseLike = {
  statusCode: number;
  setHeader: (name: string, value: string) => void;
  on: (event: 'finish', listener: () => void) => void;
};

type NextFunction = () => void;

export function requestIdMiddleware(req: RequestLike, res: ResponseLike, next: NextFunction): void {
  const requestId = ensureRequestId(req);
  const method = req.method;
  const path = req.originalUrl ?? req.url ?? '';
  req.requestStartedAtNs = process.hrtime.bigint();

  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const startedAt = req.requestStartedAtNs ?? process.hrtime.bigint();
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    runWithLogContext({ requestId }, () => {
      logInfo('http.request.completed', {
        method,
        path,
        statusCode: res.statusCode,
        durationMs: Number(durationMs.toFixed(2)),
        ...extractRequestLogContext(req)
      });
    });
  });

  runWithLogContext({ requestId }, () => {
    next();
  });
}
