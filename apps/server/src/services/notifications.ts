import { DateTime } from 'luxon';
import {
  formatLongWhen,
  formatShortWhen,
  type ReminderKind,
  type ReservingUser,
  type Slot,
} from '@volunteer-portal/shared';
import { buildInvite, type CalendarInvite } from '../lib/calendarInvite.js';
import { describeError } from '../lib/errors.js';
import type { Mailer } from '../lib/mailer.js';

export type NotifierDeps = {
  mailer: Mailer;
  zone: string;
  orgName: string;
};

export type NotificationResult = { sent: boolean; error?: string };

function slotTimes(deps: NotifierDeps, slot: Slot) {
  return {
    start: DateTime.fromJSDate(slot.startAt, { zone: deps.zone }),
    end: DateTime.fromJSDate(slot.endAt, { zone: deps.zone }),
  };
}

export function eventTitle(deps: NotifierDeps, slot: Pick<Slot, 'event'>): string {
  return `${slot.event} (${deps.orgName})`;
}

/**
 * Calendar invite for a slot. Pass the slot's stored UID so that repeated
 * invites update one calendar entry.
 */
export function inviteForSlot(
  deps: NotifierDeps,
  slot: Slot,
  description: string,
  uid?: string,
  now?: DateTime
): CalendarInvite {
  const { start, end } = slotTimes(deps, slot);
  return buildInvite({
    title: eventTitle(deps, slot),
    start,
    end,
    location: slot.location,
    description,
    uid,
    now: now?.setZone(deps.zone),
  });
}

/**
 * Emails the reserver a confirmation with the invite attached. Never throws:
 * the reservation already stands, so a failure comes back as a warning.
 */
export async function sendConfirmation(
  deps: NotifierDeps,
  slot: Slot,
  user: ReservingUser,
  now?: DateTime
): Promise<NotificationResult> {
  const { start } = slotTimes(deps, slot);
  const invite = inviteForSlot(deps, slot, `Signed up via ${deps.orgName}. Contact: ${slot.contact}`, undefined, now);

  const lines = [
    `Hi ${user.firstName},`,
    '',
    "You're confirmed for:",
    `Event: ${slot.event}`,
    `Location: ${slot.location}`,
    `When: ${formatLongWhen(start)}`,
    '',
    'Add to Google Calendar:',
    invite.googleCalendarUrl,
    '',
    'You will receive reminders 24 hours and 1 hour before.',
    '',
    `— ${deps.orgName}`,
  ];

  try {
    await deps.mailer.send({
      to: user.email,
      subject: `Confirmation: ${slot.event} (${formatShortWhen(start)})`,
      text: lines.join('\n'),
      ics: invite.ics,
    });
    return { sent: true };
  } catch (e) {
    const error = describeError(e);
    console.error('[notifications] Confirmation email failed:', error);
    return { sent: false, error };
  }
}

const REMINDER_LEAD: Record<ReminderKind, { subject: string; lead: string }> = {
  '24h': { subject: '24-hour reminder', lead: '~24 hours' },
  '1h': { subject: '1-hour reminder', lead: '~1 hour' },
};

/**
 * Sends one reminder. `uid` is the slot's calendar UID so the attached invite
 * replaces the one from any earlier reminder.
 */
export async function sendReminder(
  deps: NotifierDeps,
  slot: Slot,
  which: ReminderKind,
  uid: string,
  now?: DateTime
): Promise<NotificationResult> {
  const { start } = slotTimes(deps, slot);
  const invite = inviteForSlot(deps, slot, `Reminder from ${deps.orgName}. Contact: ${slot.contact}`, uid, now);
  const { subject, lead } = REMINDER_LEAD[which];

  const lines = [
    'Hi,',
    '',
    `Reminder: your event is in ${lead}.`,
    `Event: ${slot.event}`,
    `When: ${formatLongWhen(start)}`,
    `Location: ${slot.location}`,
    '',
    'Google Calendar link:',
    invite.googleCalendarUrl,
    '',
    `— ${deps.orgName}`,
  ];

  try {
    await deps.mailer.send({
      to: slot.email,
      subject: `${subject}: ${slot.event}`,
      text: lines.join('\n'),
      ics: invite.ics,
    });
    return { sent: true };
  } catch (e) {
    return { sent: false, error: describeError(e) };
  }
}

/**
 * SMTP check for admins: a short message with an invite starting in 5 minutes.
 * Throws on failure.
 */
export async function sendTestEmail(deps: NotifierDeps, to: string, now: DateTime = DateTime.now()): Promise<void> {
  const start = now.setZone(deps.zone).plus({ minutes: 5 });
  const invite = buildInvite({
    title: `${deps.orgName} Test`,
    start,
    end: start.plus({ minutes: 30 }),
    location: deps.orgName,
    description: 'SMTP test',
    now: now.setZone(deps.zone),
  });

  await deps.mailer.send({
    to,
    subject: `${deps.orgName} Test Email`,
    text: `This is a test email from ${deps.orgName}. If you received this, SMTP is configured correctly.`,
    ics: invite.ics,
  });
}
