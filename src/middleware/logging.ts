import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

const CORRELATION_HEADER = 'X-Correlation-ID';

export function getCorrelationId(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : 'unknown';
}

/**
 * Tags each request with a correlation id (taken from the request header or
 * generated), echoes it back and logs the outcome once the response is sent.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const correlationId = req.header(CORRELATION_HEADER) || `req_${randomUUID()}`;
  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  res.on('finish', () => {
    const duration = Date.now() - start;
    const line = `[http] ${req.method} ${req.originalUrl} - ${res.statusCode} (${duration}ms) ${correlationId}`;
    if (res.statusCode >= 500) {
      console.error(line);
    } else if (res.statusCode >= 400) {
      console.warn(line);
    } else {
      console.log(line);
    }
  });

  next();
}
