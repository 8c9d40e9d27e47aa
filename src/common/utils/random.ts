import { randomInt } from 'crypto';

export const NONCE_UPPER_BOUND = 2 ** 31;

// Non-negative 31-bit nonce, drawn per call.
export function randomNonce(): number {
  return randomInt(0, NONCE_UPPER_BOUND);
}

export function unixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}
