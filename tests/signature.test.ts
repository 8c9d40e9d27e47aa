import { createHmac } from 'crypto';
import { inspect } from 'util';
import { ValidationError } from '../src/common/errors/app-error';
import { NONCE_UPPER_BOUND, randomNonce } from '../src/common/utils/random';
import { Credential } from '../src/modules/signature/signature.credential';
import { buildCanonicalString, buildToken, signCanonicalString } from '../src/modules/signature/signature.service';

const baseCredential = {
  appId: 1,
  secretId: 'k',
  secretKey: 'test-secret',
  expired: 100,
  userId: 'u',
};

describe('Credential', () => {
  it('should accept a user id of exactly 110 characters', () => {
    const credential = new Credential({ ...baseCredential, userId: 'x'.repeat(110) });
    expect(credential.userId).toHaveLength(110);
  });

  it('should reject a user id longer than 110 characters', () => {
    expect(() => new Credential({ ...baseCredential, userId: 'x'.repeat(111) })).toThrow(ValidationError);
  });

  it('should measure the user id limit in UTF-8 bytes', () => {
    expect(new Credential({ ...baseCredential, userId: 'é'.repeat(55) }).userId).toHaveLength(55);
    expect(() => new Credential({ ...baseCredential, userId: 'é'.repeat(56) })).toThrow(ValidationError);
  });

  it('should reject an app id that is not an unsigned 32-bit integer', () => {
    expect(() => new Credential({ ...baseCredential, appId: -1 })).toThrow(ValidationError);
    expect(() => new Credential({ ...baseCredential, appId: 1.5 })).toThrow(ValidationError);
    expect(() => new Credential({ ...baseCredential, appId: 2 ** 32 })).toThrow(ValidationError);
  });

  it('should default expiry to 0 and user id to empty', () => {
    const credential = new Credential({ appId: 7, secretId: 'id', secretKey: 'test-secret' });
    expect(credential.expired).toBe(0);
    expect(credential.userId).toBe('');
  });

  it('should be frozen after construction', () => {
    const credential = new Credential(baseCredential);
    expect(Object.isFrozen(credential)).toBe(true);
  });

  it('should keep the secret key out of JSON and inspect output', () => {
    const credential = new Credential(baseCredential);
    expect(JSON.stringify(credential)).toBe('{"appId":1,"secretId":"k","expired":100,"userId":"u"}');
    expect(inspect(credential)).not.toContain('test-secret');
    expect(credential.secretKey).toBe('test-secret');
  });
});

describe('buildCanonicalString', () => {
  it('should produce the fixed field order with a trailing empty f=', () => {
    const credential = new Credential(baseCredential);
    expect(buildCanonicalString(credential, { timestamp: 1000, nonce: 5 })).toBe('a=1&k=k&e=100&t=1000&r=5&u=u&f=');
  });

  it('should leave u= empty when there is no user id', () => {
    const credential = new Credential({ ...baseCredential, userId: '' });
    expect(buildCanonicalString(credential, { timestamp: 1, nonce: 0 })).toBe('a=1&k=k&e=100&t=1&r=0&u=&f=');
  });
});

describe('signCanonicalString', () => {
  const canonical = 'a=1&k=k&e=100&t=1000&r=5&u=u&f=';

  it('should be reproducible byte for byte', () => {
    expect(signCanonicalString(canonical, 'test-secret')).toBe(
      'yIfFICI8ChpnBcggM2IIr42HYRVhPTEmaz1rJmU9MTAwJnQ9MTAwMCZyPTUmdT11JmY9',
    );
  });

  it('should place the raw HMAC-SHA1 digest before the canonical string', () => {
    const decoded = Buffer.from(signCanonicalString(canonical, 'test-secret'), 'base64');
    const digest = createHmac('sha1', 'test-secret').update(canonical).digest();

    expect(decoded.subarray(0, 20).toString('hex')).toBe('c887c520223c0a1a6705c820336208af8d876115');
    expect(decoded.subarray(0, 20).equals(digest)).toBe(true);
    expect(decoded.subarray(20).toString('utf8')).toBe(canonical);
  });
});

describe('buildToken', () => {
  it('should sign with the injected clock and nonce', () => {
    const credential = new Credential(baseCredential);
    const token = buildToken(credential, { now: () => 1000, nonce: () => 5 });
    expect(token).toBe('yIfFICI8ChpnBcggM2IIr42HYRVhPTEmaz1rJmU9MTAwJnQ9MTAwMCZyPTUmdT11JmY9');
  });

  it('should use the wall clock and a fresh nonce by default', () => {
    const credential = new Credential(baseCredential);
    const before = Math.floor(Date.now() / 1000);
    const decoded = Buffer.from(buildToken(credential), 'base64').subarray(20).toString('utf8');
    const after = Math.floor(Date.now() / 1000);

    const match = /^a=1&k=k&e=100&t=(\d+)&r=(\d+)&u=u&f=$/.exec(decoded);
    expect(match).not.toBeNull();
    const timestamp = Number(match?.[1]);
    const nonce = Number(match?.[2]);
    expect(timestamp).toBeGreaterThanOrEqual(before);
    expect(timestamp).toBeLessThanOrEqual(after);
    expect(nonce).toBeGreaterThanOrEqual(0);
    expect(nonce).toBeLessThan(NONCE_UPPER_BOUND);
  });
});

describe('randomNonce', () => {
  it('should return non-negative 31-bit integers', () => {
    for (let i = 0; i < 100; i += 1) {
      const nonce = randomNonce();
      expect(Number.isInteger(nonce)).toBe(true);
      expect(nonce).toBeGreaterThanOrEqual(0);
      expect(nonce).toBeLessThan(2 ** 31);
    }
  });
});
