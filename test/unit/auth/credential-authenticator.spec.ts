import { describe, it, expect } from 'vitest';

import { CredentialAuthenticator } from '../../../src/modules/auth/helpers/credential-authenticator';
import { BcryptPasswordHasher } from '../../../src/shared/security/bcrypt-password-hasher';
import { ManualClock } from '../../helpers/manual-clock';
import { InMemoryUserRepository } from '../../helpers/in-memory-user.repository';

async function setup() {
  const users = new InMemoryUserRepository(new ManualClock());
  const passwordHasher = new BcryptPasswordHasher({ cost: 4 });
  const user = await users.insertUser({
    email: 'a@example.com',
    name: 'A',
    passwordHash: await passwordHasher.hash('correct-horse-battery'),
  });

  return { users, user, authenticator: new CredentialAuthenticator({ users, passwordHasher }) };
}

describe('CredentialAuthenticator', () => {
  it('returns the user without the password hash', async () => {
    const { authenticator, user } = await setup();

    const result = await authenticator.authenticate('a@example.com', 'correct-horse-battery');

    expect(result).toEqual({ ok: true, value: user });
    expect(result.ok && 'passwordHash' in result.value).toBe(false);
  });

  it('names the failing check', async () => {
    const { authenticator } = await setup();

    expect(await authenticator.authenticate('b@example.com', 'correct-horse-battery')).toEqual({
      ok: false,
      error: 'user_not_found',
    });
    expect(await authenticator.authenticate('a@example.com', 'wrong-password')).toEqual({
      ok: false,
      error: 'wrong_password',
    });
  });

  it('checks the password before the active flag', async () => {
    const { authenticator, users, user } = await setup();
    users.setActive(user.id, false);

    expect(await authenticator.authenticate('a@example.com', 'wrong-password')).toEqual({
      ok: false,
      error: 'wrong_password',
    });
    expect(await authenticator.authenticate('a@example.com', 'correct-horse-battery')).toEqual({
      ok: false,
      error: 'user_inactive',
    });
  });
});

describe('BcryptPasswordHasher', () => {
  it('rejects hashes it cannot have produced', async () => {
    const hasher = new BcryptPasswordHasher({ cost: 4 });

    expect(await hasher.verify('anything', '')).toBe(false);
    expect(await hasher.verify('anything', 'plaintext')).toBe(false);
  });
});
