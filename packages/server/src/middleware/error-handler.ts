import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { TokenEndpointEnv } from '../types/hono.js';
import type { Logger } from '../logging/logger.js';
import { OAuthError } from '../errors/oauth-error.js';
import { errorFields } from '../logging/logger.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../config/constants.js';

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors into RFC-compliant OAuth error responses
 */
export function oauthErrorHandler(logger: Logger): ErrorHandler<TokenEndpointEnv> {
  return (err, c) => {
    logger.error('Request failed', {
      method: c.req.method,
      path: c.req.path,
      ...errorFields(err),
      ...(err.cause !== undefined ? { cause: errorFields(err.cause) } : {}),
    });

    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof OAuthError) {
      return c.json(err.toJSON(), err.statusCode);
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
      const messages = err.issues.map((issue) => issue.message).join(', ');
      return c.json(OAuthError.invalidRequest(messages).toJSON(), 400);
    }

    // Malformed bodies rejected by Hono itself (e.g. a non-form Content-Type)
    if (err instanceof HTTPException && err.status < 500) {
      return c.json(OAuthError.invalidRequest(err.message || undefined).toJSON(), 400);
    }

    // Handle unexpected errors
    const serverError = OAuthError.serverError(
      process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
    );

    return c.json(serverError.toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<TokenEndpointEnv> {
  return async (c, next) => {
    await next();

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Referrer policy
    c.header('Referrer-Policy', 'no-referrer');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<TokenEndpointEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log sensitive data
    logger.info('Request completed', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
