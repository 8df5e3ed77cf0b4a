import { DateTime } from 'luxon';
import {
  isBlank,
  isReservedBy,
  isTaken,
  parseDateKey,
  parseTimeOfDay,
  type AddSlotRequest,
  type ReservingUser,
  type Slot,
  type SlotFilter,
} from '@volunteer-portal/shared';
import { fail, succeed, type Outcome } from '../lib/errors.js';
import type { SlotSheet, SlotStore } from '../lib/slotStore.js';

function byStart(a: Slot, b: Slot): number {
  return a.startAt.getTime() - b.startAt.getTime();
}

/**
 * Slots matching the filter, earliest first. Defaults: upcoming only, open
 * slots only.
 */
export async function listSlots(
  store: SlotStore,
  filter: SlotFilter = {},
  now: DateTime = DateTime.now()
): Promise<Slot[]> {
  const upcomingOnly = filter.upcomingOnly ?? true;
  const includeTaken = filter.includeTaken ?? false;
  const search = (filter.search ?? '').trim().toLowerCase();
  const nowMs = now.toMillis();

  const slots = await store.listSlots();
  return slots
    .filter((s) => !upcomingOnly || s.startAt.getTime() >= nowMs)
    .filter((s) => includeTaken || !isTaken(s))
    .filter((s) => !search || `${s.event} ${s.location} ${s.contact}`.toLowerCase().includes(search))
    .sort(byStart);
}

export async function listReservationsFor(store: SlotStore, email: string): Promise<Slot[]> {
  const slots = await store.listSlots();
  return slots.filter((s) => isReservedBy(s, email)).sort(byStart);
}

function clearReservation(sheet: SlotSheet, row: number) {
  sheet.write(row, 'firstName', null);
  sheet.write(row, 'lastName', null);
  sheet.write(row, 'email', null);
  sheet.write(row, 'userId', null);
  sheet.write(row, 'reservedAt', null);
  sheet.write(row, 'sent24h', false);
  sheet.write(row, 'sent1h', false);
  sheet.write(row, 'calendarUid', null);
}

/**
 * Claims an open slot for `user`. The read and the write happen on one
 * in-memory copy of the sheet, but another process can still save in between.
 */
export async function reserveSlot(
  store: SlotStore,
  rowId: number,
  user: ReservingUser,
  now: DateTime = DateTime.now()
): Promise<Outcome<Slot>> {
  return store.transact((sheet) => {
    const slot = sheet.slotAt(rowId);
    if (!slot) {
      return { save: false, value: fail('SLOT_NOT_FOUND', 'That slot does not exist.') };
    }
    if (isTaken(slot)) {
      return { save: false, value: fail('ALREADY_TAKEN', 'That slot is already taken.') };
    }

    sheet.write(rowId, 'firstName', user.firstName.trim());
    sheet.write(rowId, 'lastName', user.lastName.trim());
    sheet.write(rowId, 'email', user.email.trim().toLowerCase());
    sheet.write(rowId, 'userId', user.id);
    sheet.writeTimestamp(rowId, 'reservedAt', now);
    sheet.write(rowId, 'sent24h', false);
    sheet.write(rowId, 'sent1h', false);
    sheet.write(rowId, 'calendarUid', null);

    const reserved = sheet.slotAt(rowId) ?? slot;
    return { save: true, value: succeed(reserved, 'Reserved!') };
  });
}

/**
 * Releases a reservation. Only the reserver may cancel, and never once the
 * slot is marked completed.
 */
export async function cancelReservation(
  store: SlotStore,
  rowId: number,
  requesterEmail: string
): Promise<Outcome<Slot>> {
  return store.transact((sheet) => {
    const slot = sheet.slotAt(rowId);
    if (!slot) {
      return { save: false, value: fail('SLOT_NOT_FOUND', 'That slot does not exist.') };
    }
    if (!isReservedBy(slot, requesterEmail)) {
      return { save: false, value: fail('NOT_OWNER', 'You can only cancel your own reservation.') };
    }
    if (!isBlank(slot.completed)) {
      return { save: false, value: fail('ALREADY_COMPLETED', 'This slot is marked completed. Contact an admin.') };
    }

    clearReservation(sheet, rowId);
    const released = sheet.slotAt(rowId) ?? slot;
    return { save: true, value: succeed(released, 'Cancelled.') };
  });
}

/**
 * Writes a new slot into the first blank row below the header, or appends it.
 */
export async function addSlot(store: SlotStore, fields: AddSlotRequest): Promise<Outcome<Slot>> {
  const event = fields.event.trim();
  const date = parseDateKey(fields.date);
  const startTime = parseTimeOfDay(fields.startTime);
  const endTime = parseTimeOfDay(fields.endTime);
  if (!event) return fail('INVALID_SLOT', 'Event name is required.');
  if (!date || !startTime || !endTime) return fail('INVALID_SLOT', 'Date, start time and end time are required.');

  return store.transact((sheet) => {
    const row = sheet.nextFreeRow();

    sheet.write(row, 'event', event);
    sheet.write(row, 'location', fields.location.trim());
    sheet.writeDate(row, 'date', date);
    sheet.writeTime(row, 'startTime', startTime);
    sheet.writeTime(row, 'endTime', endTime);
    sheet.write(row, 'hours', fields.hours);
    sheet.write(row, 'contact', fields.contact.trim());
    sheet.write(row, 'completed', null);
    clearReservation(sheet, row);

    const slot = sheet.slotAt(row);
    if (!slot) {
      return { save: false, value: fail('INVALID_SLOT', 'The new slot could not be read back.') };
    }
    return { save: true, value: succeed(slot, `Added slot at row ${row}.`) };
  });
}
