/**
 * Grant types accepted by the token endpoint
 * RFC 6749 Sections 4.1.3, 4.3.2, 6
 */
export type GrantType = 'authorization_code' | 'password' | 'refresh_token';

/**
 * Token type reported in token responses
 */
export type TokenType = 'bearer';

/**
 * Wire shape of a token endpoint response
 * - json: application/json object
 * - text: application/x-www-form-urlencoded key=value pairs
 */
export type ResponseFormat = 'json' | 'text';

/**
 * Error codes the token endpoint emits
 * RFC 6749 Section 5.2
 */
export type TokenErrorCode = 'invalid_request' | 'invalid_grant' | 'server_error';

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token?: string;
}

/**
 * Token Error Response
 * RFC 6749 Section 5.2
 */
export interface TokenErrorResponse {
  error: TokenErrorCode;
  error_description?: string;
}
