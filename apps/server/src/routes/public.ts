import express from 'express';
import multer from 'multer';
import { loginRequestSchema, signupRequestSchema } from '@volunteer-portal/shared';
import type { AccountRepository } from '../lib/accountRepository.js';
import { getUserFromReq, requireUser, signSessionToken } from '../lib/auth.js';
import type { Env } from '../lib/env.js';
import { parseOr400, sendError, sendOutcome } from '../lib/http.js';
import type { ProfilePictureStore } from '../lib/profilePictures.js';
import { getAccount, login, signup, type AccountDeps } from '../services/accounts.js';

export const MAX_PICTURE_BYTES = 5 * 1024 * 1024;

export type PublicRouteDeps = {
  env: Env;
  accounts: AccountRepository;
  pictures: ProfilePictureStore;
};

export function registerPublicRoutes(app: express.Express, deps: PublicRouteDeps) {
  const { env, pictures } = deps;
  const accountDeps: AccountDeps = { accounts: deps.accounts, forcedAdmins: env.FORCED_ADMIN_EMAILS };
  const requireUserMw = requireUser(env.JWT_SECRET);

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.post('/api/auth/signup', async (req, res) => {
    if (!env.JWT_SECRET) return res.status(500).json({ error: 'JWT_SECRET not configured' });
    const body = parseOr400(signupRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await signup(accountDeps, body);
      if (!outcome.ok) return sendOutcome(res, outcome);
      console.log('[auth] New account:', outcome.value.email);
      const token = await signSessionToken(env.JWT_SECRET, outcome.value);
      return sendOutcome(res, outcome, (user) => ({ token, user }));
    } catch (e) {
      return sendError(res, e, 'Signup failed');
    }
  });

  app.post('/api/auth/login', async (req, res) => {
    if (!env.JWT_SECRET) return res.status(500).json({ error: 'JWT_SECRET not configured' });
    const body = parseOr400(loginRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await login(accountDeps, body.email, body.password);
      if (!outcome.ok) return sendOutcome(res, outcome);
      const token = await signSessionToken(env.JWT_SECRET, outcome.value);
      return sendOutcome(res, outcome, (user) => ({ token, user }));
    } catch (e) {
      return sendError(res, e, 'Login failed');
    }
  });

  app.get('/api/me', requireUserMw, async (req, res) => {
    const session = getUserFromReq(req);
    try {
      // Admin status may have changed since the token was issued
      const account = await getAccount(accountDeps, session.email);
      if (!account) return res.status(404).json({ error: 'No account with that email.', code: 'USER_NOT_FOUND' });
      return res.json({ user: account });
    } catch (e) {
      return sendError(res, e, 'Load profile failed');
    }
  });

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_PICTURE_BYTES },
  });

  app.put('/api/me/picture', requireUserMw, upload.single('file'), async (req, res) => {
    const user = getUserFromReq(req);
    if (!req.file) return res.status(400).json({ error: 'Choose an image to upload.', code: 'INVALID_INPUT' });

    try {
      await pictures.save(user.email, req.file.buffer);
      return res.json({ success: true, message: 'Profile picture updated.' });
    } catch (e) {
      return sendError(res, e, 'Picture upload failed');
    }
  });

  app.get('/api/users/:email/picture', requireUserMw, async (req, res) => {
    try {
      const png = await pictures.load(req.params.email);
      if (!png) return res.status(404).json({ error: 'No profile picture.' });
      res.setHeader('Content-Type', 'image/png');
      res.setHeader('Cache-Control', 'private, max-age=300');
      return res.send(png);
    } catch (e) {
      return sendError(res, e, 'Picture load failed');
    }
  });
}
