import { randomUUID } from 'crypto';
import { DateTime, Duration } from 'luxon';
import { isBlank, type ReminderKind, type Slot } from '@volunteer-portal/shared';
import type { SlotStore } from '../lib/slotStore.js';
import { sendReminder, type NotifierDeps } from './notifications.js';

type ReminderWindow = {
  min: Duration;
  max: Duration;
  flag: 'sent24h' | 'sent1h';
};

// One hour wide, so a sweep every 10 minutes cannot skip past a window
export const REMINDER_WINDOWS: Record<ReminderKind, ReminderWindow> = {
  '24h': {
    min: Duration.fromObject({ hours: 23, minutes: 30 }),
    max: Duration.fromObject({ hours: 24, minutes: 30 }),
    flag: 'sent24h',
  },
  '1h': {
    min: Duration.fromObject({ minutes: 30 }),
    max: Duration.fromObject({ hours: 1, minutes: 30 }),
    flag: 'sent1h',
  },
};

const REMINDER_KINDS: ReminderKind[] = ['24h', '1h'];

/**
 * Reminders a slot is owed at `now`: its start falls inside the window and the
 * matching flag is still false.
 */
export function dueReminders(slot: Slot, now: DateTime): ReminderKind[] {
  if (isBlank(slot.email)) return [];
  const delta = slot.startAt.getTime() - now.toMillis();
  return REMINDER_KINDS.filter((kind) => {
    const window = REMINDER_WINDOWS[kind];
    return !slot[window.flag] && delta >= window.min.toMillis() && delta <= window.max.toMillis();
  });
}

export type SweepFailure = {
  rowId: number;
  kind: ReminderKind;
  error: string;
};

export type SweepResult = {
  scanned: number;
  sent: number;
  failures: SweepFailure[];
};

export type SweepDeps = NotifierDeps & {
  store: SlotStore;
};

type SentReminder = {
  slot: Slot;
  kind: ReminderKind;
  uid: string;
};

function sameReservation(a: Slot, b: Slot): boolean {
  return a.email === b.email && a.userId === b.userId && a.reservedAt?.getTime() === b.reservedAt?.getTime();
}

/**
 * One pass over the sheet. Reminders go out from a snapshot, outside the
 * store's write queue. Each reminder that went out then sets its flag and
 * stores the slot's calendar UID (created on first use), unless the row was
 * cancelled or re-reserved meanwhile. Failed sends keep their flag false and
 * are reported.
 */
export async function runReminderSweep(deps: SweepDeps, now: DateTime = DateTime.now()): Promise<SweepResult> {
  deps.mailer.assertConfigured();

  const slots = (await deps.store.listSlots()).filter((s) => !isBlank(s.email));
  const delivered: SentReminder[] = [];
  const failures: SweepFailure[] = [];

  for (const slot of slots) {
    const due = dueReminders(slot, now);
    if (due.length === 0) continue;

    const uid = slot.calendarUid || randomUUID();
    for (const kind of due) {
      const result = await sendReminder(deps, slot, kind, uid, now);
      if (result.sent) {
        delivered.push({ slot, kind, uid });
      } else {
        failures.push({ rowId: slot.rowId, kind, error: result.error ?? 'unknown error' });
      }
    }
  }

  if (delivered.length > 0) {
    await deps.store.transact((sheet) => {
      let changed = false;
      for (const { slot, kind, uid } of delivered) {
        const current = sheet.slotAt(slot.rowId);
        if (!current || !sameReservation(current, slot)) continue;
        sheet.write(slot.rowId, REMINDER_WINDOWS[kind].flag, true);
        sheet.write(slot.rowId, 'calendarUid', uid);
        changed = true;
      }
      return { save: changed, value: null };
    });
  }

  return { scanned: slots.length, sent: delivered.length, failures };
}

export function sweepMessage(result: SweepResult): string {
  if (result.sent === 0 && result.failures.length === 0) return 'No reminders due.';
  const parts = [`${result.sent} reminder(s) sent`];
  if (result.failures.length > 0) parts.push(`${result.failures.length} failed`);
  return `${parts.join(', ')}.`;
}

export function logSweep(result: SweepResult) {
  console.log(`[reminders] Scanned: ${result.scanned}, Sent: ${result.sent}, Failed: ${result.failures.length}`);
  for (const f of result.failures) {
    console.warn(`[reminders] Row ${f.rowId} (${f.kind}) failed: ${f.error}`);
  }
}
