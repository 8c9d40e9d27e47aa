import { createHmac } from 'crypto';
import { randomNonce, unixSeconds } from '../../common/utils/random';
import type { Credential } from './signature.credential';

export interface SignatureParams {
  /** Unix timestamp in seconds. */
  timestamp: number;
  nonce: number;
}

export interface SignatureSource {
  now(): number;
  nonce(): number;
}

export const systemSignatureSource: SignatureSource = {
  now: () => unixSeconds(),
  nonce: randomNonce,
};

export function buildCanonicalString(credential: Credential, params: SignatureParams): string {
  return [
    `a=${credential.appId}`,
    `k=${credential.secretId}`,
    `e=${credential.expired}`,
    `t=${params.timestamp}`,
    `r=${params.nonce}`,
    `u=${credential.userId}`,
    'f=',
  ].join('&');
}

/**
 * HMAC-SHA1 digest of the canonical string, followed by the canonical string
 * itself, base64 encoded. The service requires SHA-1.
 */
export function signCanonicalString(canonical: string, secretKey: string): string {
  const digest = createHmac('sha1', secretKey).update(canonical, 'utf8').digest();
  return Buffer.concat([digest, Buffer.from(canonical, 'utf8')]).toString('base64');
}

export function buildToken(credential: Credential, source: SignatureSource = systemSignatureSource): string {
  const canonical = buildCanonicalString(credential, {
    timestamp: source.now(),
    nonce: source.nonce(),
  });
  return signCanonicalString(canonical, credential.secretKey);
}
