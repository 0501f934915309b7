/**
 * OAuth 2.0 Constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// All supported grant types
export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Token types
export const TOKEN_TYPE_BEARER = 'bearer' as const;

// Request parameters
export const PARAM_GRANT_TYPE = 'grant_type';
export const PARAM_CODE = 'code';
export const PARAM_REDIRECT_URI = 'redirect_uri';
export const PARAM_REFRESH_TOKEN = 'refresh_token';
export const PARAM_CLIENT_ID = 'client_id';
export const PARAM_CLIENT_SECRET = 'client_secret';
export const PARAM_USERNAME = 'username';
export const PARAM_PASSWORD = 'password';
export const PARAM_SCOPE = 'scope';

// Ticket value prefixes
export const TICKET_PREFIX_AUTHORIZATION_CODE = 'OC';
export const TICKET_PREFIX_ACCESS_TOKEN = 'AT';
export const TICKET_PREFIX_REFRESH_TOKEN = 'RT';

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 7200; // 2 hours
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 30;

// Token/code lengths
export const TICKET_VALUE_LENGTH = 32; // bytes
export const CLIENT_ID_LENGTH = 16; // bytes
export const CLIENT_SECRET_LENGTH = 32; // bytes

// Default token endpoint path
export const DEFAULT_TOKEN_ENDPOINT_PATH = '/oauth2.0/accessToken';

// HTTP headers
export const HEADER_ACCEPT = 'Accept';
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';
export const CONTENT_TYPE_TEXT = 'text/plain';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
