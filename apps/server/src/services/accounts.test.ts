import { describe, it, expect } from 'vitest';
import { MemoryAccountRepository } from '../testing/memoryRepositories.js';
import {
  bootstrapAdminIfNeeded,
  getAccount,
  login,
  promoteForcedAdmins,
  setAdmin,
  signup,
  type AccountDeps,
} from './accounts.js';

const alice = { firstName: 'Alice', lastName: 'Ng', email: 'alice@example.org', password: 'test-password' };

function deps(forcedAdmins: string[] = []): AccountDeps {
  return { accounts: new MemoryAccountRepository(), forcedAdmins };
}

describe('signup', () => {
  it('creates a regular account with a hashed password', async () => {
    const d = deps();
    const outcome = await signup(d, { ...alice, email: ' Alice@Example.org ' });

    expect(outcome).toMatchObject({
      ok: true,
      value: { firstName: 'Alice', lastName: 'Ng', email: 'alice@example.org', isAdmin: false },
    });
    const stored = await d.accounts.findByEmail('alice@example.org');
    expect(stored?.passwordHash).toMatch(/^pbkdf2\$200000\$/);
    expect(stored?.passwordHash).not.toContain('test-password');
  });

  it('makes forced admins admins from the start', async () => {
    const outcome = await signup(deps(['alice@example.org']), alice);
    expect(outcome).toMatchObject({ ok: true, value: { isAdmin: true } });
  });

  it('rejects a second account for the same email', async () => {
    const d = deps();
    await signup(d, alice);
    const outcome = await signup(d, { ...alice, email: 'ALICE@example.org' });
    expect(outcome).toEqual({ ok: false, code: 'EMAIL_TAKEN', message: 'An account with that email already exists.' });
  });
});

describe('login', () => {
  it('accepts the right password only', async () => {
    const d = deps();
    await signup(d, alice);

    expect(await login(d, 'alice@example.org', 'test-password')).toMatchObject({
      ok: true,
      value: { email: 'alice@example.org' },
    });
    expect(await login(d, 'alice@example.org', 'wrong-password')).toEqual({
      ok: false,
      code: 'INVALID_CREDENTIALS',
      message: 'Invalid email or password.',
    });
    expect(await login(d, 'nobody@example.org', 'test-password')).toMatchObject({ code: 'INVALID_CREDENTIALS' });
  });

  it('promotes a forced admin on login', async () => {
    const accounts = new MemoryAccountRepository();
    await signup({ accounts, forcedAdmins: [] }, alice);

    const forced = { accounts, forcedAdmins: ['alice@example.org'] };
    expect(await login(forced, 'alice@example.org', 'test-password')).toMatchObject({ ok: true, value: { isAdmin: true } });
    expect((await getAccount(forced, 'alice@example.org'))?.isAdmin).toBe(true);
  });
});

describe('setAdmin', () => {
  it('promotes and demotes registered accounts', async () => {
    const d = deps();
    await signup(d, alice);

    expect(await setAdmin(d, 'Alice@example.org', true)).toEqual({
      ok: true,
      value: 'alice@example.org',
      message: 'alice@example.org is now an admin.',
    });
    expect((await getAccount(d, 'alice@example.org'))?.isAdmin).toBe(true);

    expect(await setAdmin(d, 'alice@example.org', false)).toMatchObject({
      ok: true,
      message: 'alice@example.org is no longer an admin.',
    });
    expect((await getAccount(d, 'alice@example.org'))?.isAdmin).toBe(false);
  });

  it('rejects unknown accounts', async () => {
    expect(await setAdmin(deps(), 'nobody@example.org', true)).toMatchObject({ ok: false, code: 'USER_NOT_FOUND' });
  });

  it('never demotes a forced admin', async () => {
    const d = deps(['alice@example.org']);
    await signup(d, alice);
    expect(await setAdmin(d, 'alice@example.org', false)).toMatchObject({ ok: false, code: 'FORCED_ADMIN' });
    expect((await getAccount(d, 'alice@example.org'))?.isAdmin).toBe(true);
  });
});

describe('promoteForcedAdmins', () => {
  it('promotes registered forced admins that are not admins yet', async () => {
    const accounts = new MemoryAccountRepository();
    await signup({ accounts, forcedAdmins: [] }, alice);
    await signup({ accounts, forcedAdmins: [] }, { ...alice, email: 'bob@example.org' });

    const d = { accounts, forcedAdmins: ['alice@example.org', 'carol@example.org'] };
    expect(await promoteForcedAdmins(d)).toBe(1);
    expect(await promoteForcedAdmins(d)).toBe(0);
    expect((await getAccount(d, 'bob@example.org'))?.isAdmin).toBe(false);
  });
});

describe('bootstrapAdminIfNeeded', () => {
  const env = {
    BOOTSTRAP_ADMIN_EMAIL: 'Admin@Example.org',
    BOOTSTRAP_ADMIN_PASSWORD: 'test-secret',
    BOOTSTRAP_ADMIN_FIRST: 'Admin',
    BOOTSTRAP_ADMIN_LAST: 'User',
  };

  it('creates the admin account once', async () => {
    const d = deps();
    expect(await bootstrapAdminIfNeeded(d, env)).toBe(true);
    expect(await bootstrapAdminIfNeeded(d, env)).toBe(false);

    expect(await getAccount(d, 'admin@example.org')).toMatchObject({
      firstName: 'Admin',
      lastName: 'User',
      email: 'admin@example.org',
      isAdmin: true,
    });
    expect(await login(d, 'admin@example.org', 'test-secret')).toMatchObject({ ok: true });
  });

  it('does nothing without credentials', async () => {
    const d = deps();
    expect(await bootstrapAdminIfNeeded(d, { ...env, BOOTSTRAP_ADMIN_PASSWORD: undefined })).toBe(false);
    expect(await getAccount(d, 'admin@example.org')).toBeNull();
  });
});
