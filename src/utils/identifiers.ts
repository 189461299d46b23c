/**
 * Identifier helpers for devices and portfolio entities
 */

import { createHash, randomBytes } from 'crypto';

/**
 * Generates the 16-hex-character device id sent with every provider request.
 * A seed makes it stable across restarts.
 */
export function generateDeviceId(seed?: string): string {
  if (seed) {
    return createHash('sha256').update(seed).digest().subarray(0, 8).toString('hex');
  }
  return randomBytes(8).toString('hex');
}

/**
 * Normalizes a display name for use in entity ids.
 * "John's Crypto" -> "johns_crypto", "Cartera Acción" -> "cartera_accion"
 */
export function normalizePortfolioName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/\p{Mn}/gu, '')
    .toLowerCase()
    .replace(/ /g, '_')
    .replace(/[^\p{L}\p{N}_]/gu, '');
}
