import type {
  AuthorizationCode,
  CreateAuthorizationCodeInput,
  RefreshToken,
  CreateRefreshTokenInput,
  AccessToken,
  CreateAccessTokenInput,
} from '@grantline/shared';

/**
 * Storage interface for authorization codes (single-use tickets)
 */
export interface IAuthorizationCodeStorage {
  /**
   * Create a new authorization code
   * Returns the code record and the plaintext code value
   */
  create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }>;

  /**
   * Find a code by plaintext value without consuming it
   */
  findByValue(codeValue: string): Promise<AuthorizationCode | null>;

  /**
   * Get and invalidate a code atomically
   *
   * Exactly one caller observes the code; every later or concurrent caller
   * gets null. Expired codes return null.
   */
  consume(codeValue: string): Promise<AuthorizationCode | null>;

  /**
   * Delete expired codes (cleanup)
   */
  deleteExpired(): Promise<number>;
}

/**
 * Storage interface for refresh tokens (reusable tickets)
 */
export interface IRefreshTokenStorage {
  /**
   * Create a new refresh token
   * Returns the token record and the plaintext token value
   */
  create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }>;

  /**
   * Find a refresh token by plaintext value; never invalidates it
   */
  findByValue(tokenValue: string): Promise<RefreshToken | null>;

  /**
   * Revoke a refresh token by ID
   */
  revoke(id: string): Promise<void>;

  /**
   * Delete expired tokens (cleanup)
   */
  deleteExpired(): Promise<number>;
}

/**
 * Storage interface for access tokens
 */
export interface IAccessTokenStorage {
  /**
   * Create a new access token
   * Returns the token record and the plaintext token value
   */
  create(input: CreateAccessTokenInput): Promise<{ token: AccessToken; value: string }>;

  /**
   * Find an access token by plaintext value
   */
  findByValue(tokenValue: string): Promise<AccessToken | null>;

  /**
   * Revoke an access token by ID
   */
  revoke(id: string): Promise<void>;

  /**
   * Delete expired tokens (cleanup)
   */
  deleteExpired(): Promise<number>;
}

/**
 * Shared ticket store for codes and tokens
 */
export interface ITicketStore {
  authorizationCodes: IAuthorizationCodeStorage;
  refreshTokens: IRefreshTokenStorage;
  accessTokens: IAccessTokenStorage;
}
