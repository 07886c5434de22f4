/**
 * Routing failure kinds. Expected conditions (missing entity, disconnected
 * graph) are thrown as RoutingErrors and mapped to HTTP statuses by the
 * error handler; anything else is an internal failure.
 */
export type RoutingErrorKind =
  | 'malformed_input'
  | 'not_found'
  | 'no_route'
  | 'timeout'
  | 'internal';

export class RoutingError extends Error {
  constructor(
    readonly kind: RoutingErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'RoutingError';
  }
}

export class MalformedInputError extends RoutingError {
  constructor(message: string) {
    super('malformed_input', message);
    this.name = 'MalformedInputError';
  }
}

export class NotFoundError extends RoutingError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export class NoRouteError extends RoutingError {
  constructor(message = 'No route found between start and destination') {
    super('no_route', message);
    this.name = 'NoRouteError';
  }
}

export class RouteTimeoutError extends RoutingError {
  constructor(timeoutMs: number) {
    super('timeout', `Route calculation timed out after ${timeoutMs}ms`);
    this.name = 'RouteTimeoutError';
  }
}

/** Broken data, e.g. an edge with a non-positive distance. */
export class InvariantViolationError extends RoutingError {
  constructor(message: string) {
    super('internal', message);
    this.name = 'InvariantViolationError';
  }
}
