import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { authFromHeaders, parseHeaders, readCookie, sapisidHash } from './auth.js';

describe('parseHeaders', () => {
  it('reads a JSON object with lower-cased names', () => {
    const headers = parseHeaders('{"Cookie": "SAPISID=abc; other=1", "X-Goog-AuthUser": 2}');
    expect(headers.get('cookie')).toBe('SAPISID=abc; other=1');
    expect(headers.get('x-goog-authuser')).toBe('2');
  });

  it('reads raw header lines', () => {
    const headers = parseHeaders([
      ':authority: music.youtube.com',
      'cookie: SAPISID=abc',
      'user-agent: TestAgent/1.0',
    ].join('\n'));
    expect(headers.get('cookie')).toBe('SAPISID=abc');
    expect(headers.get('user-agent')).toBe('TestAgent/1.0');
  });
});

describe('authFromHeaders', () => {
  it('prefers the secure SAPISID cookie', () => {
    const auth = authFromHeaders(new Map([['cookie', 'SAPISID=plain; __Secure-3PAPISID=secure=x']]));
    expect(auth.sapisid).toBe('secure=x');
    expect(auth.authUser).toBe('0');
  });

  it('rejects a cookie without SAPISID', () => {
    expect(() => authFromHeaders(new Map([['cookie', 'a=1']]))).toThrow(/SAPISID/);
    expect(() => authFromHeaders(new Map())).toThrow(/no cookie/);
  });
});

describe('sapisidHash', () => {
  it('hashes timestamp, secret and origin', () => {
    const expected = createHash('sha1').update('1700000000 test-secret https://music.youtube.com').digest('hex');
    expect(sapisidHash('test-secret', 1700000000)).toBe(`SAPISIDHASH 1700000000_${expected}`);
  });
});

describe('readCookie', () => {
  it('returns undefined for a missing cookie', () => {
    expect(readCookie('a=1; b=2', 'b')).toBe('2');
    expect(readCookie('a=1', 'c')).toBeUndefined();
  });
});
