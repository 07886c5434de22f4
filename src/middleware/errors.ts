import type { NextFunction, Request, Response } from 'express';
import { RoutingError, type RoutingErrorKind } from '../services/errors';
import { getCorrelationId } from './logging';

const STATUS_BY_KIND: Record<RoutingErrorKind, number> = {
  malformed_input: 400,
  not_found: 404,
  no_route: 404,
  timeout: 503,
  internal: 500,
};

const TYPE_BY_KIND: Record<RoutingErrorKind, string> = {
  malformed_input: 'malformed_input',
  not_found: 'not_found',
  no_route: 'no_route',
  timeout: 'timeout',
  internal: 'internal_error',
};

export interface ErrorBody {
  error: string;
  status_code: number;
  type: string;
  path: string;
  correlation_id: string;
  timestamp: string;
}

// express.json() rejects unparseable bodies with a status-carrying error
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

/**
 * The single translation point from failures to HTTP responses. Expected
 * routing conditions keep their message; unexpected failures are logged in
 * full and, in production, reported without detail.
 */
export function createErrorHandler(options: { isProduction: boolean }) {
  return function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction,
  ): void {
    if (res.headersSent) {
      next(err);
      return;
    }

    let kind: RoutingErrorKind = 'internal';
    let message = 'Internal server error';

    if (err instanceof RoutingError) {
      kind = err.kind;
      message = err.message;
    } else if (isBodyParserError(err) && err.status < 500) {
      kind = 'malformed_input';
      message = 'Malformed JSON body';
    } else if (!options.isProduction && err instanceof Error) {
      message = `Route calculation failed: ${err.message}`;
    }

    const status = STATUS_BY_KIND[kind];
    const correlationId = getCorrelationId(res);

    if (status >= 500) {
      console.error(`[error] ${req.method} ${req.originalUrl} (${correlationId})`, err);
    } else {
      console.warn(`[http] ${status} ${req.method} ${req.originalUrl}: ${message} (${correlationId})`);
    }

    const body: ErrorBody = {
      error: message,
      status_code: status,
      type: TYPE_BY_KIND[kind],
      path: req.path,
      correlation_id: correlationId,
      timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
  };
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new RoutingError('not_found', `No route for ${req.method} ${req.path}`));
}
