import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { BrokerEnv } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import { BrokerError, GenerationExhaustedError } from '../errors/broker-error.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('http');

type ValidationIssue = { path: ReadonlyArray<string | number>; message: string };

export function describeIssues(issues: ReadonlyArray<ValidationIssue>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Hook for zValidator: report validation failures as invalid_request
 */
export function rejectInvalid(
  result: { success: true } | { success: false; error: { issues: ReadonlyArray<ValidationIssue> } }
): void {
  if (!result.success) {
    throw OAuthError.invalidRequest(describeIssues(result.error.issues));
  }
}

/**
 * Global error handler
 *
 * OAuth errors become RFC 6749 error bodies, broker errors their own JSON
 * body, and anything else a server_error.
 */
export const brokerErrorHandler: ErrorHandler<BrokerEnv> = (err, c) => {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof OAuthError) {
    if (err.statusCode >= 500) {
      logger.error('OAuth server error', { path: c.req.path, error: err });
    } else {
      logger.info('OAuth error response', { path: c.req.path, code: err.code, expired: err.expired });
    }
    return c.json(err.toJSON(), err.statusCode);
  }

  if (err instanceof BrokerError) {
    if (err instanceof GenerationExhaustedError) {
      logger.error('Identifier space exhausted', { kind: err.kind, attempts: err.attempts });
    }
    return c.json(err.toJSON(), err.statusCode);
  }

  if (err instanceof ZodError) {
    return c.json(OAuthError.invalidRequest(describeIssues(err.issues)).toJSON(), 400);
  }

  logger.error('Unhandled error', { path: c.req.path, error: err });

  const serverError = OAuthError.serverError(
    process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
  );

  return c.json(serverError.toJSON(), 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<BrokerEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    if (c.req.path.includes('/authorize')) {
      c.header('Content-Security-Policy', "default-src 'self'; frame-ancestors 'none'; form-action 'self'");
    }

    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<BrokerEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Path only: query strings can carry codes
    logger.info('Request handled', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
