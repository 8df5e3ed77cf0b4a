import type { Slot, SlotView } from '../types/slot.js';

export function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim() === '';
}

/**
 * A slot is taken when either reserver name is filled in. Email and user id
 * are not consulted: they can lag behind the names.
 */
export function isTaken(slot: Pick<Slot, 'firstName' | 'lastName'>): boolean {
  return !isBlank(slot.firstName) || !isBlank(slot.lastName);
}

export function isReservedBy(slot: Pick<Slot, 'email'>, email: string): boolean {
  const stored = slot.email.trim().toLowerCase();
  return stored !== '' && stored === email.trim().toLowerCase();
}

export function toSlotView(slot: Slot, viewerEmail?: string): SlotView {
  return {
    rowId: slot.rowId,
    event: slot.event,
    location: slot.location,
    contact: slot.contact,
    startAt: slot.startAt.toISOString(),
    endAt: slot.endAt.toISOString(),
    hours: slot.hours,
    taken: isTaken(slot),
    completed: !isBlank(slot.completed),
    reservedByMe: viewerEmail ? isReservedBy(slot, viewerEmail) : false,
  };
}
