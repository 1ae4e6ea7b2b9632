import { describe, expect, it } from 'vitest';
import { UsersRepo } from '../src/repositories/usersRepo';
import { AuthService } from '../src/services/authService';

function makeAuth() {
  const users = new UsersRepo();
  return { users, auth: new AuthService(users, 4) };
}

describe('AuthService.register', () => {
  it('stores a bcrypt hash, not the password', async () => {
    const { users, auth } = makeAuth();
    expect(await auth.register('alice', 'secret1')).toBe(0);
    const user = await users.getUserByUsername('alice');
    expect(user?.username).toBe('alice');
    expect(user?.password_hash).not.toBe('secret1');
    expect(user?.password_hash.startsWith('$2')).toBe(true);
  });

  it('rejects duplicate usernames', async () => {
    const { auth } = makeAuth();
    await auth.register('alice', 'secret1');
    expect(await auth.register('alice', 'another1')).toBe(1);
  });

  it('lets only one of two concurrent registrations claim a name', async () => {
    const { auth } = makeAuth();
    const results = await Promise.all([auth.register('alice', 'firstpw1'), auth.register('alice', 'secondpw2')]);
    expect(results).toEqual([0, 1]);
    expect(await auth.login('alice', 'firstpw1')).toBe(0);
    expect(await auth.login('alice', 'secondpw2')).toBe(2);
  });

  it('rejects empty fields as malformed', async () => {
    const { auth } = makeAuth();
    expect(await auth.register('', 'secret1')).toBe(2);
    expect(await auth.register('alice', '')).toBe(2);
  });

  it('rejects short passwords', async () => {
    const { auth } = makeAuth();
    expect(await auth.register('alice', 'abc12')).toBe(3);
  });

  it('rejects non-alphanumeric usernames and passwords', async () => {
    const { auth } = makeAuth();
    expect(await auth.register('al ice', 'secret1')).toBe(4);
    expect(await auth.register('alice', 'secret-1')).toBe(4);
    expect(await auth.register('alice', 'a!')).toBe(4);
  });
});

describe('AuthService.login', () => {
  it('accepts the registered password', async () => {
    const { auth } = makeAuth();
    await auth.register('alice', 'secret1');
    expect(await auth.login('alice', 'secret1')).toBe(0);
  });

  it('distinguishes unknown users from wrong passwords', async () => {
    const { auth } = makeAuth();
    await auth.register('alice', 'secret1');
    expect(await auth.login('bob', 'secret1')).toBe(1);
    expect(await auth.login('alice', 'secret2')).toBe(2);
  });

  it('matches usernames exactly', async () => {
    const { auth } = makeAuth();
    await auth.register('alice', 'secret1');
    expect(await auth.login('Alice', 'secret1')).toBe(1);
  });
});
