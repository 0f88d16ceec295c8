/**
 * Shared-secret challenge for the local socket.
 *
 *   1. Bridge sends one frame holding a random nonce.
 *   2. Client answers with one frame: HMAC-SHA256(secret, nonce).
 *   3. Bridge compares in constant time; a mismatch closes the socket.
 *
 * Both roles import this module so their signatures always agree.
 */

import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';

export const CHALLENGE_NONCE_BYTES = 32;
export const CHALLENGE_RESPONSE_BYTES = 32;

export function createChallenge(): Uint8Array {
  return new Uint8Array(randomBytes(CHALLENGE_NONCE_BYTES));
}

export function signChallenge(secret: string, nonce: Uint8Array): Uint8Array {
  return new Uint8Array(createHmac('sha256', secret).update(nonce).digest());
}

export function verifyChallenge(secret: string, nonce: Uint8Array, response: Uint8Array): boolean {
  if (response.length !== CHALLENGE_RESPONSE_BYTES) return false;
  return timingSafeEqual(signChallenge(secret, nonce), response);
}
