import type { ResponseFormat, TokenResponse } from '@grantline/shared';
import type { IssuedTokens } from '../types/grant.js';
import type { Result, ProtocolFailure } from '../errors/result.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  TOKEN_TYPE_BEARER,
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_TEXT,
  HEADER_CONTENT_TYPE,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../config/constants.js';

/**
 * Rendered token endpoint response
 */
export interface RenderedResponse {
  status: 200 | 400;
  contentType: string;
  body: string;
}

/**
 * Headers for a rendered token endpoint response; token responses are never cached
 */
export function responseHeaders(rendered: RenderedResponse): Record<string, string> {
  return {
    [HEADER_CONTENT_TYPE]: rendered.contentType,
    [HEADER_CACHE_CONTROL]: TOKEN_CACHE_CONTROL,
    [HEADER_PRAGMA]: TOKEN_PRAGMA,
  };
}

/**
 * Pick the response format from an Accept header
 */
export function negotiateResponseFormat(
  accept: string | undefined,
  fallback: ResponseFormat
): ResponseFormat {
  if (!accept) {
    return fallback;
  }

  const mediaTypes = accept
    .split(',')
    .map((part) => part.split(';')[0]?.trim().toLowerCase() ?? '');

  if (mediaTypes.includes(CONTENT_TYPE_JSON)) {
    return 'json';
  }

  if (mediaTypes.includes(CONTENT_TYPE_TEXT) || mediaTypes.includes(CONTENT_TYPE_FORM)) {
    return 'text';
  }

  return fallback;
}

/**
 * Renders token endpoint outcomes as JSON or form-encoded text
 */
export class ResponseBuilder {
  render(outcome: Result<IssuedTokens, ProtocolFailure>, format: ResponseFormat): RenderedResponse {
    return outcome.ok
      ? this.renderSuccess(outcome.value, format)
      : this.renderFailure(outcome.error, format);
  }

  renderSuccess(tokens: IssuedTokens, format: ResponseFormat): RenderedResponse {
    const response: TokenResponse = {
      access_token: tokens.accessToken.value,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: tokens.expiresIn,
    };

    if (tokens.refreshToken) {
      response.refresh_token = tokens.refreshToken.value;
    }

    if (format === 'json') {
      return { status: 200, contentType: CONTENT_TYPE_JSON, body: JSON.stringify(response) };
    }

    const params = new URLSearchParams();
    params.set('access_token', response.access_token);
    params.set('token_type', response.token_type);
    params.set('expires_in', String(response.expires_in));
    if (response.refresh_token) {
      params.set('refresh_token', response.refresh_token);
    }

    return { status: 200, contentType: CONTENT_TYPE_FORM, body: params.toString() };
  }

  renderFailure(failure: ProtocolFailure, format: ResponseFormat): RenderedResponse {
    const error =
      failure.kind === 'invalid_request'
        ? OAuthError.invalidRequest(failure.description)
        : OAuthError.invalidGrant(failure.description);

    if (format === 'json') {
      return { status: 400, contentType: CONTENT_TYPE_JSON, body: JSON.stringify(error.toJSON()) };
    }

    return { status: 400, contentType: CONTENT_TYPE_FORM, body: error.toFormBody() };
  }
}

// Singleton instance
export const responseBuilder = new ResponseBuilder();
