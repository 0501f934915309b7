import { randomBytes } from 'node:crypto';
import {
  TICKET_VALUE_LENGTH,
  CLIENT_ID_LENGTH,
  CLIENT_SECRET_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate an opaque ticket value, e.g. `AT-1-3kT9...`
 */
export function generateTicketValue(prefix: string, length: number = TICKET_VALUE_LENGTH): string {
  return `${prefix}-1-${generateRandomBase64Url(length)}`;
}

/**
 * Generate a secure random client ID
 */
export function generateClientId(length: number = CLIENT_ID_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a secure random client secret
 */
export function generateClientSecret(length: number = CLIENT_SECRET_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique ID for stored records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}
