import type { NextFunction, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';

type RejectionContext = Record<string, unknown>;

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

export function buildRateLimiter(options: RateLimitOptions) {
  const { windowMs, max } = options;
  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logSecurityRejection(req, 'rate-limit', {
        limitWindowMs: windowMs,
        limitMax: max,
      });
      res.status(429).json({ error: 'Too many requests' });
    },
  });
}

const DOCS_PATH = '/api-docs';

/**
 * Standard hardening headers. Swagger UI needs inline scripts, so the docs
 * path is left alone outside production.
 */
export function securityHeaders(options: { isProduction: boolean }) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!options.isProduction && req.path.startsWith(DOCS_PATH)) {
      next();
      return;
    }

    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    res.setHeader(
      'Content-Security-Policy',
      [
        "default-src 'self'",
        "img-src 'self' data: https:",
        "connect-src 'self' https:",
        "object-src 'none'",
        "base-uri 'self'",
        "form-action 'self'",
      ].join('; '),
    );
    next();
  };
}

function logSecurityRejection(
  req: Request,
  reason: string,
  context: RejectionContext = {},
): void {
  console.warn('[request-security]', {
    reason,
    method: req.method,
    path: req.originalUrl || req.url,
    ip: req.ip,
    ...context,
  });
}
