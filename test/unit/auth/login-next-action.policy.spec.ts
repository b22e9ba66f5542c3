import { describe, it, expect } from 'vitest';
import { decideLoginNextAction } from '../../../src/modules/auth/policies/login-next-action.policy';

describe('decideLoginNextAction', () => {
  it('no device => ISSUE_SESSION', () => {
    expect(decideLoginNextAction({ device: undefined })).toBe('ISSUE_SESSION');
  });

  it('confirmed + active device => CHALLENGE_2FA', () => {
    expect(decideLoginNextAction({ device: { isConfirmed: true, isActive: true } })).toBe(
      'CHALLENGE_2FA',
    );
  });

  it('setup in progress (unconfirmed) => ISSUE_SESSION', () => {
    expect(decideLoginNextAction({ device: { isConfirmed: false, isActive: true } })).toBe(
      'ISSUE_SESSION',
    );
  });

  it('disabled device => ISSUE_SESSION', () => {
    expect(decideLoginNextAction({ device: { isConfirmed: true, isActive: false } })).toBe(
      'ISSUE_SESSION',
    );
  });
});
