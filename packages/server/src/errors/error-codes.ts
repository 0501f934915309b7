/**
 * OAuth 2.0 Error Codes
 * RFC 6749 Section 5.2
 */

import type { TokenErrorCode } from '@grantline/shared';

export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_INVALID_GRANT = 'invalid_grant' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All OAuth error codes the token endpoint emits
 */
export type OAuthErrorCode = TokenErrorCode;

/**
 * HTTP status codes for OAuth errors
 */
export const ERROR_STATUS_CODES = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_INVALID_GRANT]: 400,
  [ERROR_SERVER_ERROR]: 500,
} as const satisfies Record<OAuthErrorCode, number>;

export type OAuthErrorStatus = (typeof ERROR_STATUS_CODES)[OAuthErrorCode];

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<OAuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]:
    'The request is missing a required parameter, includes an invalid parameter value, includes a parameter more than once, or is otherwise malformed.',
  [ERROR_INVALID_GRANT]:
    'The provided authorization grant or refresh token is invalid, expired, revoked, or was issued to another client.',
  [ERROR_SERVER_ERROR]:
    'The authorization server encountered an unexpected condition that prevented it from fulfilling the request.',
};
