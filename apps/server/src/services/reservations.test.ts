import { afterEach, describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { addSlotRequestSchema, isTaken, type ReservingUser } from '@volunteer-portal/shared';
import { createTempSheet, TEST_ZONE, type TempSheet } from '../testing/fixtures.js';
import { addSlot, cancelReservation, listReservationsFor, listSlots, reserveSlot } from './reservations.js';

const now = DateTime.fromISO('2026-03-13T12:00:00', { zone: TEST_ZONE });

const alice: ReservingUser = { id: 'user-a', firstName: 'Alice', lastName: 'Ng', email: 'Alice@Example.org' };
const bob: ReservingUser = { id: 'user-b', firstName: 'Bob', lastName: 'Ruiz', email: 'bob@example.org' };

let sheet: TempSheet | undefined;

afterEach(async () => {
  await sheet?.cleanup();
  sheet = undefined;
});

async function openSheet(rows: Parameters<typeof createTempSheet>[0] = []) {
  sheet = await createTempSheet(rows);
  return sheet.store;
}

describe('listSlots', () => {
  const rows = [
    { event: 'Food Drive', location: 'Pantry', date: '2026-03-16', startTime: '09:00', endTime: '12:00' },
    { event: 'Open House', location: 'Main Hall', date: '2026-03-14', startTime: '10:00', endTime: '11:00' },
    { event: 'Past Cleanup', location: 'Park', date: '2026-03-01', startTime: '09:00', endTime: '10:00' },
    { event: 'Bake Sale', location: 'Lobby', date: '2026-03-15', startTime: '13:00', endTime: '15:00', firstName: 'Sam' },
  ];

  it('lists open upcoming slots earliest first', async () => {
    const store = await openSheet(rows);
    const slots = await listSlots(store, {}, now);
    expect(slots.map((s) => s.event)).toEqual(['Open House', 'Food Drive']);
  });

  it('includes taken and past slots on request', async () => {
    const store = await openSheet(rows);
    const slots = await listSlots(store, { includeTaken: true, upcomingOnly: false }, now);
    expect(slots.map((s) => s.event)).toEqual(['Past Cleanup', 'Open House', 'Bake Sale', 'Food Drive']);
  });

  it('searches event, location and contact case-insensitively', async () => {
    const store = await openSheet(rows);
    const slots = await listSlots(store, { search: '  HALL ' }, now);
    expect(slots.map((s) => s.event)).toEqual(['Open House']);
  });
});

describe('reserveSlot', () => {
  const row = { event: 'Open House', location: 'Main Hall', date: '2026-03-14', startTime: '10:00', endTime: '11:00' };

  it('fills the reservation fields and resets the reminder state', async () => {
    const store = await openSheet([row]);
    const outcome = await reserveSlot(store, 4, alice, now);
    expect(outcome).toMatchObject({ ok: true, message: 'Reserved!' });

    const slot = await store.getSlot(4);
    expect(slot).toMatchObject({
      firstName: 'Alice',
      lastName: 'Ng',
      email: 'alice@example.org',
      userId: 'user-a',
      sent24h: false,
      sent1h: false,
      calendarUid: '',
    });
    expect(slot?.reservedAt?.toISOString()).toBe('2026-03-13T12:00:00.000Z');
    expect(slot && isTaken(slot)).toBe(true);
  });

  it('clears reminder state left on an open row', async () => {
    const store = await openSheet([row]);
    await store.transact((s) => {
      s.write(4, 'sent24h', true);
      s.write(4, 'sent1h', true);
      s.write(4, 'calendarUid', 'old');
      return { save: true, value: null };
    });
    expect(await store.getSlot(4)).toMatchObject({ sent24h: true, sent1h: true, calendarUid: 'old' });

    expect(await reserveSlot(store, 4, alice, now)).toMatchObject({ ok: true });
    expect(await store.getSlot(4)).toMatchObject({ sent24h: false, sent1h: false, calendarUid: '' });
  });

  it('gives a slot to only one of two simultaneous reservations', async () => {
    const store = await openSheet([row]);
    const outcomes = await Promise.all([reserveSlot(store, 4, alice, now), reserveSlot(store, 4, bob, now)]);

    expect(outcomes.map((o) => o.ok)).toEqual([true, false]);
    expect(outcomes[1]).toMatchObject({ code: 'ALREADY_TAKEN' });
    expect(await store.getSlot(4)).toMatchObject({ firstName: 'Alice', email: 'alice@example.org' });
  });

  it('keeps simultaneous reservations of different slots', async () => {
    const store = await openSheet([row, { ...row, event: 'Bake Sale' }]);
    await Promise.all([reserveSlot(store, 4, alice, now), reserveSlot(store, 5, bob, now)]);

    expect((await store.getSlot(4))?.email).toBe('alice@example.org');
    expect((await store.getSlot(5))?.email).toBe('bob@example.org');
  });

  it('rejects a taken slot and leaves it unchanged', async () => {
    const store = await openSheet([row]);
    await reserveSlot(store, 4, alice, now);

    const outcome = await reserveSlot(store, 4, bob, now);
    expect(outcome).toEqual({ ok: false, code: 'ALREADY_TAKEN', message: 'That slot is already taken.' });

    const slot = await store.getSlot(4);
    expect(slot).toMatchObject({ firstName: 'Alice', lastName: 'Ng', email: 'alice@example.org', userId: 'user-a' });
  });

  it('treats a slot with only a name filled in as taken', async () => {
    const store = await openSheet([{ ...row, lastName: 'Walk-in' }]);
    const outcome = await reserveSlot(store, 4, alice, now);
    expect(outcome).toMatchObject({ ok: false, code: 'ALREADY_TAKEN' });
  });

  it('rejects a row that holds no slot', async () => {
    const store = await openSheet([row]);
    const outcome = await reserveSlot(store, 9, alice, now);
    expect(outcome).toMatchObject({ ok: false, code: 'SLOT_NOT_FOUND' });
  });
});

describe('cancelReservation', () => {
  const row = { event: 'Open House', location: 'Main Hall', date: '2026-03-14', startTime: '10:00', endTime: '11:00' };

  it('only lets the reserver cancel', async () => {
    const store = await openSheet([row]);
    await reserveSlot(store, 4, alice, now);

    const outcome = await cancelReservation(store, 4, bob.email);
    expect(outcome).toEqual({ ok: false, code: 'NOT_OWNER', message: 'You can only cancel your own reservation.' });
    expect((await store.getSlot(4))?.firstName).toBe('Alice');
  });

  it('refuses once the slot is marked completed', async () => {
    const store = await openSheet([row]);
    await reserveSlot(store, 4, alice, now);
    await store.transact((s) => {
      s.write(4, 'completed', 'x');
      return { save: true, value: null };
    });

    const outcome = await cancelReservation(store, 4, 'alice@example.org');
    expect(outcome).toMatchObject({ ok: false, code: 'ALREADY_COMPLETED' });
  });

  it('clears every reservation field and both reminder flags', async () => {
    const store = await openSheet([row]);
    await reserveSlot(store, 4, alice, now);
    await store.transact((s) => {
      s.write(4, 'sent24h', true);
      s.write(4, 'sent1h', true);
      s.write(4, 'calendarUid', 'uid-123');
      return { save: true, value: null };
    });

    const outcome = await cancelReservation(store, 4, ' ALICE@example.org ');
    expect(outcome).toMatchObject({ ok: true, message: 'Cancelled.' });

    const slot = await store.getSlot(4);
    expect(slot).toMatchObject({
      firstName: '',
      lastName: '',
      email: '',
      userId: '',
      reservedAt: null,
      sent24h: false,
      sent1h: false,
      calendarUid: '',
    });
  });
});

describe('addSlot', () => {
  it('rejects a slot without a usable date', async () => {
    const store = await openSheet();
    const outcome = await addSlot(store, {
      event: 'Open House',
      location: '',
      date: 'someday',
      startTime: '10:00',
      endTime: '11:00',
      hours: 1,
      contact: '',
    });
    expect(outcome).toMatchObject({ ok: false, code: 'INVALID_SLOT' });
  });

  it('fills a blank row before appending', async () => {
    const store = await openSheet([
      { event: 'Food Drive', date: '2026-03-16', startTime: '09:00', endTime: '12:00' },
      { event: '' },
      { event: 'Bake Sale', date: '2026-03-15', startTime: '13:00', endTime: '15:00' },
    ]);
    const fields = addSlotRequestSchema.parse({
      event: 'Open House',
      date: '2026-03-14',
      startTime: '10:00 AM',
      endTime: '11:30 AM',
      hours: '1.5',
    });

    const outcome = await addSlot(store, fields);
    expect(outcome).toMatchObject({ ok: true, message: 'Added slot at row 5.' });
    expect(await store.getSlot(5)).toMatchObject({ event: 'Open House', hours: 1.5, location: '', contact: '' });
  });
});

describe('sign-up flow', () => {
  it('add, list, reserve, conflict, cancel, list', async () => {
    const store = await openSheet();
    const tomorrow = now.plus({ days: 1 }).toFormat('yyyy-MM-dd');

    const added = await addSlot(
      store,
      addSlotRequestSchema.parse({ event: 'Open House', date: tomorrow, startTime: '10:00', endTime: '11:00' })
    );
    expect(added).toMatchObject({ ok: true, message: 'Added slot at row 4.' });

    const open = await listSlots(store, {}, now);
    expect(open.map((s) => [s.rowId, s.event])).toEqual([[4, 'Open House']]);
    expect(open[0]?.startAt.toISOString()).toBe('2026-03-14T10:00:00.000Z');

    expect(await reserveSlot(store, 4, alice, now)).toMatchObject({ ok: true });
    expect(await listSlots(store, {}, now)).toEqual([]);
    const all = await listSlots(store, { includeTaken: true }, now);
    expect(all.map((s) => isTaken(s))).toEqual([true]);
    expect((await listReservationsFor(store, 'alice@example.org')).map((s) => s.rowId)).toEqual([4]);

    expect(await reserveSlot(store, 4, bob, now)).toMatchObject({ ok: false, code: 'ALREADY_TAKEN' });

    expect(await cancelReservation(store, 4, alice.email)).toMatchObject({ ok: true });
    const reopened = await listSlots(store, {}, now);
    expect(reopened.map((s) => s.rowId)).toEqual([4]);
    expect(await listReservationsFor(store, 'alice@example.org')).toEqual([]);
  });
});
