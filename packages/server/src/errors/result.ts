/**
 * Outcome of a pipeline step, returned instead of thrown
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Request failed a precondition; nothing was touched
 */
export interface InvalidRequestFailure {
  kind: 'invalid_request';
  description: string;
}

/**
 * Grant could not be resolved; extractor side effects (a consumed code) stand
 */
export interface InvalidGrantFailure {
  kind: 'invalid_grant';
  description: string;
}

/**
 * A store or signing call failed; surfaced as a server error
 */
export interface StorageFailure {
  kind: 'storage_failure';
  description: string;
  cause: unknown;
}

export type TokenFailure = InvalidRequestFailure | InvalidGrantFailure | StorageFailure;

/**
 * Failures that map onto the OAuth error vocabulary
 */
export type ProtocolFailure = InvalidRequestFailure | InvalidGrantFailure;

export function invalidRequest(description: string): InvalidRequestFailure {
  return { kind: 'invalid_request', description };
}

export function invalidGrant(description: string): InvalidGrantFailure {
  return { kind: 'invalid_grant', description };
}

export function storageFailure(description: string, cause: unknown): StorageFailure {
  return { kind: 'storage_failure', description, cause };
}
