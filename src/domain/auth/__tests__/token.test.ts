import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenCodec } from '../token.js';

const SECRET = 'test-secret';
const T0 = Date.UTC(2026, 0, 1);

function flipBit(token: string, index: number, bit: number): string {
  const flipped = String.fromCharCode(token.charCodeAt(index) ^ (1 << bit));
  return token.slice(0, index) + flipped + token.slice(index + 1);
}

describe('TokenCodec', () => {
  it('round-trips the subject email', () => {
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 3600 });

    expect(codec.verify(codec.issue('a@x.com'))).toBe('a@x.com');
  });

  it('issues a three-part HS256 token carrying sub, iat and exp', () => {
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 3600 }, () => T0);
    const token = codec.issue('a@x.com');

    expect(token.split('.')).toHaveLength(3);
    const decoded = jwt.decode(token, { complete: true });
    expect(decoded?.header.alg).toBe('HS256');
    expect(decoded?.payload).toEqual({
      sub: 'a@x.com',
      iat: T0 / 1000,
      exp: T0 / 1000 + 3600,
    });
  });

  it('rejects every single-bit mutation of an issued token', () => {
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 3600 });
    const token = codec.issue('a@x.com');

    for (let i = 0; i < token.length; i++) {
      for (let bit = 0; bit < 7; bit++) {
        expect(codec.verify(flipBit(token, i, bit))).toBeNull();
      }
    }
  });

  it('rejects a token signed with another secret', () => {
    const other = new TokenCodec({ secret: 'other-secret', ttlSeconds: 3600 });
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 3600 });

    expect(codec.verify(other.issue('a@x.com'))).toBeNull();
  });

  it('rejects tokens using any algorithm other than HS256', () => {
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 0 });
    const hs512 = jwt.sign({ sub: 'a@x.com' }, SECRET, { algorithm: 'HS512' });
    const unsigned = jwt.sign({ sub: 'a@x.com' }, '', { algorithm: 'none' });

    expect(codec.verify(hs512)).toBeNull();
    expect(codec.verify(unsigned)).toBeNull();
  });

  it('rejects a validly signed token without a usable subject', () => {
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 0 });

    expect(codec.verify(jwt.sign({ email: 'a@x.com' }, SECRET))).toBeNull();
    expect(codec.verify(jwt.sign({ sub: '' }, SECRET))).toBeNull();
    expect(codec.verify(jwt.sign('a@x.com', SECRET))).toBeNull();
  });

  it('rejects garbage', () => {
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 0 });

    expect(codec.verify('')).toBeNull();
    expect(codec.verify('not-a-token')).toBeNull();
    expect(codec.verify('a.b.c')).toBeNull();
  });

  it('expires tokens once the configured TTL has elapsed', () => {
    let now = T0;
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 60 }, () => now);
    const token = codec.issue('a@x.com');

    now = T0 + 59_000;
    expect(codec.verify(token)).toBe('a@x.com');

    now = T0 + 60_000;
    expect(codec.verify(token)).toBeNull();
  });

  it('never expires tokens when the TTL is zero', () => {
    let now = T0;
    const codec = new TokenCodec({ secret: SECRET, ttlSeconds: 0 }, () => now);
    const token = codec.issue('a@x.com');

    expect(jwt.decode(token)).toEqual({ sub: 'a@x.com', iat: T0 / 1000 });

    now = T0 + 10 * 365 * 24 * 60 * 60 * 1000;
    expect(codec.verify(token)).toBe('a@x.com');
  });
});
