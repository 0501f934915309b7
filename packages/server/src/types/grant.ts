import type {
  GrantType,
  CallerProfile,
  ClientProfile,
  UserProfile,
  Principal,
  RegisteredService,
  AuthorizationCode,
  RefreshToken,
  AccessToken,
} from '@grantline/shared';

/**
 * Token request as received: form parameters plus the caller profile
 */
export interface TokenRequest {
  grantType: string | undefined;
  params: Readonly<Record<string, string>>;
  profile: CallerProfile | null;
}

interface ValidatedRequestBase {
  params: Readonly<Record<string, string>>;
  service: RegisteredService;
}

export interface ValidatedAuthorizationCodeRequest extends ValidatedRequestBase {
  grantType: 'authorization_code';
  profile: ClientProfile;
  code: string;
  redirectUri: string;
}

export interface ValidatedRefreshTokenRequest extends ValidatedRequestBase {
  grantType: 'refresh_token';
  profile: ClientProfile;
  refreshToken: string;
}

export interface ValidatedPasswordRequest extends ValidatedRequestBase {
  grantType: 'password';
  profile: UserProfile;
  clientId: string;
}

/**
 * Token request that passed every precondition check
 */
export type ValidatedTokenRequest =
  | ValidatedAuthorizationCodeRequest
  | ValidatedRefreshTokenRequest
  | ValidatedPasswordRequest;

interface IssuanceContextBase {
  service: RegisteredService;
  principal: Principal;
  targetService: string;
  scopes: string[];
}

export interface AuthorizationCodeIssuanceContext extends IssuanceContextBase {
  grantType: 'authorization_code';
  code: AuthorizationCode;
  mintRefreshToken: boolean;
}

export interface RefreshTokenIssuanceContext extends IssuanceContextBase {
  grantType: 'refresh_token';
  refreshToken: RefreshToken;
  // Refresh tokens are not rotated
  mintRefreshToken: false;
}

export interface PasswordIssuanceContext extends IssuanceContextBase {
  grantType: 'password';
  mintRefreshToken: boolean;
}

/**
 * Canonical input to token issuance, produced by a grant extractor
 */
export type IssuanceContext =
  | AuthorizationCodeIssuanceContext
  | RefreshTokenIssuanceContext
  | PasswordIssuanceContext;

/**
 * Tokens minted for one successful request
 */
export interface IssuedTokens {
  grantType: GrantType;
  accessToken: { token: AccessToken; value: string };
  refreshToken?: { token: RefreshToken; value: string };
  expiresIn: number;
}
