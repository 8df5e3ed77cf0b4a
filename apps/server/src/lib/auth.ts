import { randomBytes, pbkdf2Sync, timingSafeEqual } from 'crypto';
import { SignJWT, jwtVerify } from 'jose';
import type express from 'express';
import { z } from 'zod';
import type { SessionUser } from '@volunteer-portal/shared';
import type { AccountRepository } from './accountRepository.js';

const PBKDF2_ITERS = 200_000;
const PBKDF2_KEYLEN = 32;
const PBKDF2_DIGEST = 'sha256';
const SESSION_TTL = '7d';

export function hashPassword(password: string): string {
  const salt = randomBytes(16);
  const derived = pbkdf2Sync(password, salt, PBKDF2_ITERS, PBKDF2_KEYLEN, PBKDF2_DIGEST);
  return `pbkdf2$${PBKDF2_ITERS}$${salt.toString('base64')}$${derived.toString('base64')}`;
}

export function verifyPassword(password: string, passwordHash: string): boolean {
  try {
    const parts = passwordHash.split('$');
    if (parts.length !== 4) return false;
    const [algo, itersStr, saltB64, hashB64] = parts;
    if (algo !== 'pbkdf2') return false;
    const iters = Number(itersStr);
    if (!Number.isFinite(iters) || iters < 10_000) return false;
    const salt = Buffer.from(saltB64, 'base64');
    const expected = Buffer.from(hashB64, 'base64');
    const actual = pbkdf2Sync(password, salt, iters, expected.length, PBKDF2_DIGEST);
    return timingSafeEqual(expected, actual);
  } catch {
    return false;
  }
}

const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  firstName: z.string(),
  lastName: z.string(),
  isAdmin: z.boolean(),
});

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

export async function signSessionToken(secret: string, user: SessionUser): Promise<string> {
  return new SignJWT({
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    isAdmin: user.isAdmin,
  })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(user.id)
    .setIssuedAt()
    .setExpirationTime(SESSION_TTL)
    .sign(secretKey(secret));
}

export async function verifySessionToken(secret: string, token: string): Promise<SessionUser | null> {
  try {
    const verified = await jwtVerify(token, secretKey(secret), { algorithms: ['HS256'] });
    const claims = sessionClaimsSchema.safeParse(verified.payload);
    if (!claims.success) return null;
    const { sub, ...rest } = claims.data;
    return { id: sub, ...rest };
  } catch {
    return null;
  }
}

const sessions = new WeakMap<express.Request, SessionUser>();

/**
 * Session user attached by `requireUser`. Only call from handlers mounted
 * behind it.
 */
export function getUserFromReq(req: express.Request): SessionUser {
  const user = sessions.get(req);
  if (!user) throw new Error('getUserFromReq called on a route without requireUser');
  return user;
}

function getBearerToken(req: express.Request): string | null {
  const h = req.headers.authorization;
  if (!h?.startsWith('Bearer ')) return null;
  return h.slice('Bearer '.length);
}

export function requireUser(secret: string | undefined): express.RequestHandler {
  return async (req, res, next) => {
    if (!secret) return res.status(500).json({ error: 'JWT_SECRET not configured' });
    const token = getBearerToken(req);
    if (!token) return res.status(401).json({ error: 'Not signed in' });

    const user = await verifySessionToken(secret, token);
    if (!user) return res.status(401).json({ error: 'Invalid or expired session' });

    sessions.set(req, user);
    return next();
  };
}

/**
 * Checks the stored account rather than the token, so a demotion applies to
 * sessions that are already open.
 */
export function requireAdmin(accounts: Pick<AccountRepository, 'findByEmail'>): express.RequestHandler {
  return async (req, res, next) => {
    const user = sessions.get(req);
    if (!user) return res.status(403).json({ error: 'Admin tools are restricted.' });

    try {
      const account = await accounts.findByEmail(user.email);
      if (!account?.isAdmin) return res.status(403).json({ error: 'Admin tools are restricted.' });
      sessions.set(req, { ...user, isAdmin: true });
      return next();
    } catch (e) {
      return next(e);
    }
  };
}
