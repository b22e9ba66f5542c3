import { describe, it, expect } from 'vitest';

import {
  getSessionInactivity,
  isSessionActive,
} from '../../../src/modules/sessions/policies/session-activity.policy';
import { addSeconds } from '../../../src/shared/time/clock';
import { TEST_EPOCH } from '../../helpers/manual-clock';

const base = {
  revokedAt: null,
  lastUsedAt: TEST_EPOCH,
  expiresAt: addSeconds(TEST_EPOCH, 3600),
};

describe('getSessionInactivity', () => {
  it('is null for a fresh session', () => {
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 10), 60)).toBeNull();
  });

  it('reports revoked before anything else', () => {
    const revoked = { ...base, revokedAt: TEST_EPOCH };
    expect(getSessionInactivity(revoked, addSeconds(TEST_EPOCH, 7200), 60)).toBe('revoked');
  });

  it('reports expired from expiresAt on', () => {
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 3599), null)).toBeNull();
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 3600), null)).toBe('expired');
  });

  it('reports expired before idle', () => {
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 3600), 60)).toBe('expired');
  });

  it('reports idle only after the timeout has fully passed', () => {
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 60), 60)).toBeNull();
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 61), 60)).toBe('idle');
  });

  it('ignores idleness when no timeout is configured', () => {
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 3000), null)).toBeNull();
    expect(getSessionInactivity(base, addSeconds(TEST_EPOCH, 3000), 0)).toBeNull();
  });
});

describe('isSessionActive', () => {
  it('requires not revoked and not expired', () => {
    expect(isSessionActive(base, TEST_EPOCH)).toBe(true);
    expect(isSessionActive(base, addSeconds(TEST_EPOCH, 3600))).toBe(false);
    expect(isSessionActive({ ...base, revokedAt: TEST_EPOCH }, TEST_EPOCH)).toBe(false);
  });
});
