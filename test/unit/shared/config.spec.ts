import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';
import { buildTestConfig, TEST_SIGNING_KEY } from '../../helpers/build-test-app';

const REQUIRED_ENV = {
  DATABASE_URL: 'postgres://localhost/test',
  REDIS_URL: 'redis://localhost:6379',
  JWT_SIGNING_KEY: TEST_SIGNING_KEY,
};

describe('buildConfig', () => {
  it('applies token, cookie and two-factor defaults', () => {
    const config = buildTestConfig();

    expect(config.jwt).toEqual({
      signingKey: TEST_SIGNING_KEY,
      algorithm: 'HS256',
      accessTtlSeconds: 3600,
      refreshTtlSeconds: 604800,
      rememberMeRefreshTtlSeconds: 2592000,
      rotateRefreshTokens: true,
      blacklistAfterRotation: true,
      idleTimeoutSeconds: null,
    });
    expect(config.cookies).toEqual({
      enabled: true,
      accessName: 'access_token',
      refreshName: 'refresh_token',
      domain: null,
      path: '/',
      secure: true,
      sameSite: 'Lax',
    });
    expect(config.twoFactor).toEqual({
      issuer: 'Auth Session Core',
      challengeTtlSeconds: 300,
      backupCodesCount: 10,
    });
  });

  it('reads "false" flags as false', () => {
    const config = buildTestConfig({
      JWT_ROTATE_REFRESH_TOKENS: 'false',
      JWT_BLACKLIST_AFTER_ROTATION: '0',
      AUTH_COOKIES_ENABLED: 'false',
    });

    expect(config.jwt.rotateRefreshTokens).toBe(false);
    expect(config.jwt.blacklistAfterRotation).toBe(false);
    expect(config.cookies.enabled).toBe(false);
  });

  it('treats an unset, empty or zero idle timeout as disabled', () => {
    expect(buildTestConfig({ AUTH_IDLE_TIMEOUT_SECONDS: '' }).jwt.idleTimeoutSeconds).toBeNull();
    expect(buildTestConfig({ AUTH_IDLE_TIMEOUT_SECONDS: '0' }).jwt.idleTimeoutSeconds).toBeNull();
    expect(buildTestConfig({ AUTH_IDLE_TIMEOUT_SECONDS: '60' }).jwt.idleTimeoutSeconds).toBe(60);
  });

  it('drops the Secure cookie flag in development unless forced', () => {
    expect(buildConfig({ ...REQUIRED_ENV, NODE_ENV: 'development' }).cookies.secure).toBe(false);
    expect(
      buildConfig({ ...REQUIRED_ENV, NODE_ENV: 'development', AUTH_COOKIE_SECURE: 'true' }).cookies
        .secure,
    ).toBe(true);
    expect(
      buildConfig({ ...REQUIRED_ENV, NODE_ENV: 'production', AUTH_COOKIE_SECURE: 'false' }).cookies
        .secure,
    ).toBe(false);
  });

  it('rejects a signing key shorter than 32 characters', () => {
    expect(() => buildConfig({ ...REQUIRED_ENV, JWT_SIGNING_KEY: 'too-short' })).toThrow(
      'JWT_SIGNING_KEY must be at least 32 characters',
    );
  });

  it('rejects non-HMAC algorithms and unknown environments', () => {
    expect(() => buildConfig({ ...REQUIRED_ENV, JWT_ALGORITHM: 'RS256' })).toThrow();
    expect(() => buildConfig({ ...REQUIRED_ENV, NODE_ENV: 'staging' })).toThrow();
  });
});
