import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { ResponseFormat } from '@grantline/shared';
import type { TokenEndpointEnv } from '../../types/hono.js';
import type { ICallerAuthenticator } from '../../storage/interfaces/index.js';
import type { TokenRequestProcessor } from '../../services/token-request-processor.js';
import type { RenderedResponse } from '../../services/response-builder.js';
import type { Logger } from '../../logging/logger.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { invalidRequest } from '../../errors/result.js';
import { callerProfileResolver } from '../../middleware/caller-profile.js';
import {
  responseBuilder,
  negotiateResponseFormat,
  responseHeaders,
} from '../../services/response-builder.js';
import { HEADER_ACCEPT, PARAM_GRANT_TYPE } from '../../config/constants.js';

export interface TokenRouteOptions {
  processRequest: TokenRequestProcessor;
  callerAuthenticator: ICallerAuthenticator;
  defaultResponseFormat: ResponseFormat;
  logger?: Logger;
}

// Every token request parameter is a single string
const tokenFormSchema = z.record(z.string());

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { processRequest, callerAuthenticator, defaultResponseFormat, logger } = options;

  const router = new Hono<TokenEndpointEnv>();

  // POST /oauth2.0/accessToken
  router.post(
    '/',
    callerProfileResolver({ callerAuthenticator, defaultResponseFormat, logger }),
    zValidator('form', tokenFormSchema, (result, c) => {
      if (!result.success) {
        const format = negotiateResponseFormat(c.req.header(HEADER_ACCEPT), defaultResponseFormat);
        const rendered = responseBuilder.renderFailure(
          invalidRequest('Token request parameters must be single string values'),
          format
        );
        return c.body(rendered.body, rendered.status, responseHeaders(rendered));
      }
    }),
    async (c) => {
      const params = c.req.valid('form');
      const format = negotiateResponseFormat(c.req.header(HEADER_ACCEPT), defaultResponseFormat);

      const outcome = await processRequest({
        grantType: params[PARAM_GRANT_TYPE],
        params,
        profile: c.get('callerProfile'),
      });

      let rendered: RenderedResponse;

      if (outcome.ok) {
        rendered = responseBuilder.renderSuccess(outcome.value, format);
      } else if (outcome.error.kind === 'storage_failure') {
        // Surfaced by the global error handler as server_error
        throw OAuthError.serverError(outcome.error.description, outcome.error.cause);
      } else {
        rendered = responseBuilder.renderFailure(outcome.error, format);
      }

      return c.body(rendered.body, rendered.status, responseHeaders(rendered));
    }
  );

  return router;
}
