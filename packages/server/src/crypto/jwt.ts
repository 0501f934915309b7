import * as jose from 'jose';

/**
 * Claims of a JWT access token
 * RFC 9068
 */
export interface AccessTokenClaims {
  iss: string;
  sub: string;
  aud: string;
  client_id: string;
  jti: string;
  scope?: string;
  iat: number;
  exp: number;
}

export type AccessTokenSigner = (claims: AccessTokenClaims) => Promise<string>;

/**
 * Create an HS256 access token signer from a shared secret
 */
export function createAccessTokenSigner(secret: string): AccessTokenSigner {
  const key = new TextEncoder().encode(secret);

  return async (claims) => {
    const { iat, exp, ...payload } = claims;

    return new jose.SignJWT(payload)
      .setProtectedHeader({ alg: 'HS256', typ: 'at+jwt' })
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(key);
  };
}

/**
 * Verify an HS256 access token and return its payload
 */
export async function verifyAccessToken(token: string, secret: string): Promise<jose.JWTPayload> {
  const { payload } = await jose.jwtVerify(token, new TextEncoder().encode(secret), {
    algorithms: ['HS256'],
    typ: 'at+jwt',
  });
  return payload;
}
