import type express from 'express';
import { listSlotsQuerySchema, rowIdParamSchema, toSlotView } from '@volunteer-portal/shared';
import { getUserFromReq, requireUser } from '../lib/auth.js';
import type { Env } from '../lib/env.js';
import { parseOr400, sendError, sendOutcome } from '../lib/http.js';
import type { Mailer } from '../lib/mailer.js';
import type { SlotStore } from '../lib/slotStore.js';
import { inviteForSlot, sendConfirmation, type NotifierDeps } from '../services/notifications.js';
import { cancelReservation, listReservationsFor, listSlots, reserveSlot } from '../services/reservations.js';

export type SlotRouteDeps = {
  env: Env;
  store: SlotStore;
  mailer: Mailer;
};

export function registerSlotRoutes(app: express.Express, deps: SlotRouteDeps) {
  const { env, store, mailer } = deps;
  const notifier: NotifierDeps = { mailer, zone: store.zone, orgName: env.ORG_NAME };
  const requireUserMw = requireUser(env.JWT_SECRET);

  app.get('/api/slots', requireUserMw, async (req, res) => {
    const query = parseOr400(listSlotsQuerySchema, req.query, res);
    if (!query) return;
    const user = getUserFromReq(req);

    try {
      const slots = await listSlots(store, {
        upcomingOnly: query.upcoming,
        includeTaken: query.includeTaken,
        search: query.search,
      });
      return res.json({ items: slots.map((s) => toSlotView(s, user.email)) });
    } catch (e) {
      return sendError(res, e, 'List slots failed');
    }
  });

  app.get('/api/slots/mine', requireUserMw, async (req, res) => {
    const user = getUserFromReq(req);
    try {
      const slots = await listReservationsFor(store, user.email);
      return res.json({ items: slots.map((s) => toSlotView(s, user.email)) });
    } catch (e) {
      return sendError(res, e, 'List reservations failed');
    }
  });

  app.post('/api/slots/:rowId/reserve', requireUserMw, async (req, res) => {
    const rowId = parseOr400(rowIdParamSchema, req.params.rowId, res);
    if (rowId === null) return;
    const user = getUserFromReq(req);

    try {
      const outcome = await reserveSlot(store, rowId, user);
      if (!outcome.ok) return sendOutcome(res, outcome);

      console.log(`[slots] Row ${rowId} reserved by ${user.email}`);
      const email = await sendConfirmation(notifier, outcome.value, user);
      return sendOutcome(res, outcome, (slot) => ({
        slot: toSlotView(slot, user.email),
        emailSent: email.sent,
        ...(email.error ? { emailWarning: `Reserved, but the confirmation email failed: ${email.error}` } : {}),
      }));
    } catch (e) {
      return sendError(res, e, 'Reserve failed');
    }
  });

  app.post('/api/slots/:rowId/cancel', requireUserMw, async (req, res) => {
    const rowId = parseOr400(rowIdParamSchema, req.params.rowId, res);
    if (rowId === null) return;
    const user = getUserFromReq(req);

    try {
      const outcome = await cancelReservation(store, rowId, user.email);
      if (outcome.ok) console.log(`[slots] Row ${rowId} cancelled by ${user.email}`);
      return sendOutcome(res, outcome, (slot) => ({ slot: toSlotView(slot, user.email) }));
    } catch (e) {
      return sendError(res, e, 'Cancel failed');
    }
  });

  app.get('/api/slots/:rowId/calendar.ics', requireUserMw, async (req, res) => {
    const rowId = parseOr400(rowIdParamSchema, req.params.rowId, res);
    if (rowId === null) return;

    try {
      const slot = await store.getSlot(rowId);
      if (!slot) return res.status(404).json({ error: 'That slot does not exist.', code: 'SLOT_NOT_FOUND' });

      const invite = inviteForSlot(notifier, slot, `Contact: ${slot.contact}`, slot.calendarUid || undefined);
      res.setHeader('Content-Type', 'text/calendar; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="slot-${rowId}.ics"`);
      return res.send(invite.ics);
    } catch (e) {
      return sendError(res, e, 'Calendar export failed');
    }
  });

  app.get('/api/slots/:rowId/calendar/google', requireUserMw, async (req, res) => {
    const rowId = parseOr400(rowIdParamSchema, req.params.rowId, res);
    if (rowId === null) return;

    try {
      const slot = await store.getSlot(rowId);
      if (!slot) return res.status(404).json({ error: 'That slot does not exist.', code: 'SLOT_NOT_FOUND' });

      const invite = inviteForSlot(notifier, slot, `Contact: ${slot.contact}`);
      return res.json({ url: invite.googleCalendarUrl });
    } catch (e) {
      return sendError(res, e, 'Calendar link failed');
    }
  });
}
