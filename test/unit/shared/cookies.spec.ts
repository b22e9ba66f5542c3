import { describe, it, expect } from 'vitest';

import { parseCookies, serializeCookie } from '../../../src/shared/http/cookies';
import type { CookieConfig } from '../../../src/app/config';

const COOKIES: CookieConfig = {
  enabled: true,
  accessName: 'access_token',
  refreshName: 'refresh_token',
  domain: null,
  path: '/',
  secure: true,
  sameSite: 'Lax',
};

describe('parseCookies', () => {
  it('splits pairs and decodes values', () => {
    expect(parseCookies('access_token=abc; refresh_token=a%2Bb; theme=dark')).toEqual({
      access_token: 'abc',
      refresh_token: 'a+b',
      theme: 'dark',
    });
  });

  it('keeps values with "=" and ignores pairs without one', () => {
    expect(parseCookies('a=x=y; junk; b=')).toEqual({ a: 'x=y', b: '' });
  });

  it('returns the raw value when decoding fails', () => {
    expect(parseCookies('a=%E0%A4%A')).toEqual({ a: '%E0%A4%A' });
  });

  it('handles a missing header', () => {
    expect(parseCookies(undefined)).toEqual({});
  });
});

describe('serializeCookie', () => {
  it('writes HttpOnly cookies with the configured flags', () => {
    expect(serializeCookie('access_token', 'a+b', { maxAgeSeconds: 3600, cookies: COOKIES })).toBe(
      'access_token=a%2Bb; Max-Age=3600; Path=/; HttpOnly; SameSite=Lax; Secure',
    );
  });

  it('adds the domain, omits Secure when off and floors Max-Age at zero', () => {
    const cookies: CookieConfig = {
      ...COOKIES,
      domain: 'example.com',
      secure: false,
      sameSite: 'Strict',
    };

    expect(serializeCookie('refresh_token', '', { maxAgeSeconds: -5.5, cookies })).toBe(
      'refresh_token=; Max-Age=0; Path=/; HttpOnly; SameSite=Strict; Domain=example.com',
    );
  });
});
