import { randomUUID } from 'crypto';
import type { Account, SignupRequest } from '@volunteer-portal/shared';
import type { AccountRecord, AccountRepository } from '../lib/accountRepository.js';
import { hashPassword, verifyPassword } from '../lib/auth.js';
import { fail, succeed, type Outcome } from '../lib/errors.js';
import type { Env } from '../lib/env.js';

export type AccountDeps = {
  accounts: AccountRepository;
  forcedAdmins: string[];
};

function toAccount(record: AccountRecord): Account {
  return {
    id: record.id,
    firstName: record.firstName,
    lastName: record.lastName,
    email: record.email,
    isAdmin: record.isAdmin,
  };
}

export function isForcedAdmin(deps: AccountDeps, email: string): boolean {
  return deps.forcedAdmins.includes(email.trim().toLowerCase());
}

export async function signup(deps: AccountDeps, input: SignupRequest, now = new Date()): Promise<Outcome<Account>> {
  const email = input.email.trim().toLowerCase();
  const record: AccountRecord = {
    id: randomUUID(),
    firstName: input.firstName.trim(),
    lastName: input.lastName.trim(),
    email,
    passwordHash: hashPassword(input.password),
    isAdmin: isForcedAdmin(deps, email),
    createdAt: now,
  };

  const inserted = await deps.accounts.insert(record);
  if (!inserted) return fail('EMAIL_TAKEN', 'An account with that email already exists.');
  return succeed(toAccount(record), 'Account created.');
}

export async function login(deps: AccountDeps, email: string, password: string): Promise<Outcome<Account>> {
  const record = await deps.accounts.findByEmail(email);
  if (!record || !verifyPassword(password, record.passwordHash)) {
    return fail('INVALID_CREDENTIALS', 'Invalid email or password.');
  }

  if (!record.isAdmin && isForcedAdmin(deps, record.email)) {
    await deps.accounts.setAdmin(record.email, true);
    record.isAdmin = true;
  }
  return succeed(toAccount(record), 'Signed in.');
}

export async function getAccount(deps: AccountDeps, email: string): Promise<Account | null> {
  const record = await deps.accounts.findByEmail(email);
  return record ? toAccount(record) : null;
}

export async function setAdmin(deps: AccountDeps, email: string, isAdmin: boolean): Promise<Outcome<string>> {
  const target = email.trim().toLowerCase();
  if (!isAdmin && isForcedAdmin(deps, target)) {
    return fail('FORCED_ADMIN', `${target} is a permanent admin and cannot be demoted.`);
  }

  const updated = await deps.accounts.setAdmin(target, isAdmin);
  if (!updated) return fail('USER_NOT_FOUND', 'No account with that email.');
  return succeed(target, isAdmin ? `${target} is now an admin.` : `${target} is no longer an admin.`);
}

/**
 * Promotes every registered forced admin. Accounts that do not exist yet are
 * promoted when they sign up.
 */
export async function promoteForcedAdmins(deps: AccountDeps): Promise<number> {
  let promoted = 0;
  for (const email of deps.forcedAdmins) {
    const record = await deps.accounts.findByEmail(email);
    if (!record || record.isAdmin) continue;
    if (await deps.accounts.setAdmin(email, true)) promoted++;
  }
  return promoted;
}

export async function bootstrapAdminIfNeeded(
  deps: AccountDeps,
  env: Pick<Env, 'BOOTSTRAP_ADMIN_EMAIL' | 'BOOTSTRAP_ADMIN_PASSWORD' | 'BOOTSTRAP_ADMIN_FIRST' | 'BOOTSTRAP_ADMIN_LAST'>
): Promise<boolean> {
  const email = env.BOOTSTRAP_ADMIN_EMAIL?.trim().toLowerCase();
  const password = env.BOOTSTRAP_ADMIN_PASSWORD;
  if (!email || !password) return false;

  try {
    const existing = await deps.accounts.findByEmail(email);
    if (existing) return false;

    const inserted = await deps.accounts.insert({
      id: randomUUID(),
      firstName: env.BOOTSTRAP_ADMIN_FIRST,
      lastName: env.BOOTSTRAP_ADMIN_LAST,
      email,
      passwordHash: hashPassword(password),
      isAdmin: true,
      createdAt: new Date(),
    });
    if (inserted) console.log('[server] Bootstrapped admin user:', email);
    return inserted;
  } catch (e) {
    console.warn('[server] Failed to bootstrap admin user (continuing):', e);
    return false;
  }
}
