import crypto from 'node:crypto';
import { addHours } from 'date-fns';

/**
 * Generate a random session token.
 */
export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString('hex');
}

export const SESSION_EXPIRY_HOURS = 24;

export function getSessionExpiry(from: Date = new Date()): Date {
  return addHours(from, SESSION_EXPIRY_HOURS);
}
