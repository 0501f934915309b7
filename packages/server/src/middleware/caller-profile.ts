import type { MiddlewareHandler } from 'hono';
import type { ResponseFormat } from '@grantline/shared';
import type { TokenEndpointEnv } from '../types/hono.js';
import type { ICallerAuthenticator } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { invalidRequest } from '../errors/result.js';
import { errorFields, silentLogger } from '../logging/logger.js';
import {
  responseBuilder,
  negotiateResponseFormat,
  responseHeaders,
} from '../services/response-builder.js';
import { HEADER_ACCEPT, HEADER_AUTHORIZATION } from '../config/constants.js';

export interface CallerProfileResolverOptions {
  callerAuthenticator: ICallerAuthenticator;
  defaultResponseFormat: ResponseFormat;
  logger?: Logger;
}

/**
 * Keep the single-valued string fields of a parsed form body
 */
export function stringParams(body: Record<string, unknown>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}

/**
 * Middleware that resolves the caller profile of a token request
 *
 * Sets `callerProfile` in context variables; null when the caller could not be
 * identified. Rejecting such requests is the validator's job. A body that
 * cannot be parsed is answered here with `invalid_request`.
 */
export function callerProfileResolver(
  options: CallerProfileResolverOptions
): MiddlewareHandler<TokenEndpointEnv> {
  const { callerAuthenticator, defaultResponseFormat } = options;
  const logger = options.logger ?? silentLogger;

  return async (c, next) => {
    let body: Record<string, unknown>;

    try {
      body = await c.req.parseBody();
    } catch (cause) {
      logger.warn('Token request body could not be parsed', errorFields(cause));

      const rendered = responseBuilder.renderFailure(
        invalidRequest('Request body could not be parsed'),
        negotiateResponseFormat(c.req.header(HEADER_ACCEPT), defaultResponseFormat)
      );
      return c.body(rendered.body, rendered.status, responseHeaders(rendered));
    }

    const profile = await callerAuthenticator.resolveProfile({
      authorization: c.req.header(HEADER_AUTHORIZATION),
      params: stringParams(body),
    });

    c.set('callerProfile', profile);
    await next();
  };
}
