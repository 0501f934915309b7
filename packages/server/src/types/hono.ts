import type { CallerProfile } from '@grantline/shared';

/**
 * Hono context variables for the token endpoint
 */
export interface TokenEndpointVariables {
  callerProfile: CallerProfile | null;
}

export type TokenEndpointEnv = { Variables: TokenEndpointVariables };
