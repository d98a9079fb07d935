/**
 * =============================================================================
 * CRYPTOGRAPHIC UTILITIES
 * =============================================================================
 *
 * Random identifiers that riders see (PNRs) and log masking.
 * Uses Node.js built-in crypto; never Math.random().
 *
 * @module crypto.utils
 * =============================================================================
 */

import { randomInt } from 'crypto';
import { PNR } from '../../core/constants';

/**
 * Random string drawn uniformly from `charset`
 *
 * randomInt() is used per character, so there is no modulo bias.
 *
 * @example
 * generateSecureString(6, '0123456789'); // "847291"
 */
export function generateSecureString(length: number, charset: string): string {
  if (length <= 0 || charset.length === 0) {
    throw new Error('generateSecureString needs a positive length and a non-empty charset');
  }

  let result = '';
  for (let i = 0; i < length; i++) {
    result += charset[randomInt(charset.length)];
  }
  return result;
}

/**
 * Booking reference shown on the ticket: 10 characters of A-Z / 0-9
 *
 * @example
 * generatePnr(); // "K7Q2ZP0M4D"
 */
export function generatePnr(): string {
  return generateSecureString(PNR.LENGTH, PNR.ALPHABET);
}

/**
 * Mask a sensitive value for logging
 *
 * @example
 * maskForLogging("TXN-123456")  // "TX******56"
 */
export function maskForLogging(
  value: string,
  visibleStart: number = 2,
  visibleEnd: number = 2
): string {
  if (!value || value.length <= visibleStart + visibleEnd) {
    return '****';
  }

  const start = value.slice(0, visibleStart);
  const end = value.slice(-visibleEnd);
  const masked = '*'.repeat(Math.min(value.length - visibleStart - visibleEnd, 6));

  return `${start}${masked}${end}`;
}
