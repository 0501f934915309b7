/**
 * Authenticated subject a ticket is bound to
 */
export interface Principal {
  id: string;
  attributes: Record<string, unknown>;
}

/**
 * Machine client calling the token endpoint with its own credentials
 */
export interface ClientProfile {
  kind: 'client';
  id: string; // client_id
}

/**
 * Resource owner calling the token endpoint (password grant)
 */
export interface UserProfile {
  kind: 'user';
  id: string;
  attributes: Record<string, unknown>;
}

/**
 * Identity the authentication layer established for the current request
 */
export type CallerProfile = ClientProfile | UserProfile;
