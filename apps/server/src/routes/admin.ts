import type express from 'express';
import { z } from 'zod';
import { addSlotRequestSchema, adminEmailRequestSchema, lockPostRequestSchema, toSlotView } from '@volunteer-portal/shared';
import type { AccountRepository } from '../lib/accountRepository.js';
import { getUserFromReq, requireAdmin, requireUser } from '../lib/auth.js';
import type { Env } from '../lib/env.js';
import type { ForumRepository } from '../lib/forumRepository.js';
import { parseOr400, sendError, sendOutcome } from '../lib/http.js';
import type { Mailer } from '../lib/mailer.js';
import type { SlotStore } from '../lib/slotStore.js';
import { setAdmin, type AccountDeps } from '../services/accounts.js';
import { deletePost, deleteReply, setLock } from '../services/forum.js';
import { sendTestEmail } from '../services/notifications.js';
import { logSweep, runReminderSweep, sweepMessage, type SweepDeps } from '../services/reminders.js';
import { addSlot } from '../services/reservations.js';

export type AdminRouteDeps = {
  env: Env;
  store: SlotStore;
  mailer: Mailer;
  accounts: AccountRepository;
  forum: ForumRepository;
};

const testEmailRequestSchema = z.object({
  to: z.string().trim().toLowerCase().email('Please enter a valid email.').optional(),
});

export function registerAdminRoutes(app: express.Express, deps: AdminRouteDeps) {
  const { env, store, mailer, forum } = deps;
  const accountDeps: AccountDeps = { accounts: deps.accounts, forcedAdmins: env.FORCED_ADMIN_EMAILS };
  const sweepDeps: SweepDeps = { store, mailer, zone: store.zone, orgName: env.ORG_NAME };
  const requireUserMw = requireUser(env.JWT_SECRET);
  const requireAdminMw = requireAdmin(deps.accounts);

  app.post('/api/admin/slots', requireUserMw, requireAdminMw, async (req, res) => {
    const body = parseOr400(addSlotRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await addSlot(store, body);
      if (outcome.ok) console.log(`[admin] ${outcome.message}`);
      return sendOutcome(res, outcome, (slot) => ({ slot: toSlotView(slot) }));
    } catch (e) {
      return sendError(res, e, 'Add slot failed');
    }
  });

  app.post('/api/admin/users/promote', requireUserMw, requireAdminMw, async (req, res) => {
    const body = parseOr400(adminEmailRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await setAdmin(accountDeps, body.email, true);
      return sendOutcome(res, outcome, (email) => ({ email }));
    } catch (e) {
      return sendError(res, e, 'Promote failed');
    }
  });

  app.post('/api/admin/users/demote', requireUserMw, requireAdminMw, async (req, res) => {
    const body = parseOr400(adminEmailRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await setAdmin(accountDeps, body.email, false);
      return sendOutcome(res, outcome, (email) => ({ email }));
    } catch (e) {
      return sendError(res, e, 'Demote failed');
    }
  });

  app.post('/api/admin/email/test', requireUserMw, requireAdminMw, async (req, res) => {
    const body = parseOr400(testEmailRequestSchema, req.body ?? {}, res);
    if (!body) return;
    const to = body.to ?? getUserFromReq(req).email;

    try {
      await sendTestEmail(sweepDeps, to);
      return res.json({ success: true, message: `Test email sent to ${to}.` });
    } catch (e) {
      return sendError(res, e, 'Test email failed');
    }
  });

  app.post('/api/admin/forum/posts/:postId/lock', requireUserMw, requireAdminMw, async (req, res) => {
    const body = parseOr400(lockPostRequestSchema, req.body, res);
    if (!body) return;

    try {
      const outcome = await setLock(forum, req.params.postId, body.locked);
      return sendOutcome(res, outcome, (locked) => ({ locked }));
    } catch (e) {
      return sendError(res, e, 'Lock failed');
    }
  });

  app.delete('/api/admin/forum/posts/:postId', requireUserMw, requireAdminMw, async (req, res) => {
    try {
      const outcome = await deletePost(forum, req.params.postId);
      return sendOutcome(res, outcome);
    } catch (e) {
      return sendError(res, e, 'Delete post failed');
    }
  });

  app.delete('/api/admin/forum/posts/:postId/replies/:replyId', requireUserMw, requireAdminMw, async (req, res) => {
    try {
      const outcome = await deleteReply(forum, req.params.postId, req.params.replyId);
      return sendOutcome(res, outcome);
    } catch (e) {
      return sendError(res, e, 'Delete reply failed');
    }
  });

  app.post('/api/admin/reminders/run', requireUserMw, requireAdminMw, async (_req, res) => {
    try {
      const result = await runReminderSweep(sweepDeps);
      logSweep(result);
      return res.json({ success: true, message: sweepMessage(result), ...result });
    } catch (e) {
      return sendError(res, e, 'Reminder sweep failed');
    }
  });

  // Scheduler entry point, authenticated by shared secret header
  app.post('/api/cron/send-reminders', async (req, res) => {
    const expectedSecret = env.CRON_SECRET;
    if (!expectedSecret) return res.status(503).json({ error: 'CRON_SECRET not configured' });

    const cronSecret = req.get('x-cron-secret') || req.get('authorization');
    if (cronSecret !== expectedSecret && cronSecret !== `Bearer ${expectedSecret}`) {
      return res.status(401).json({ error: 'Unauthorized' });
    }

    try {
      const result = await runReminderSweep(sweepDeps);
      logSweep(result);
      return res.json({ success: true, message: sweepMessage(result), ...result });
    } catch (e) {
      return sendError(res, e, 'Reminder sweep failed');
    }
  });
}
