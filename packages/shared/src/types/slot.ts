export type ReminderKind = '24h' | '1h';

/**
 * One bookable row of the sign-up sheet. Reservation fields are blank strings
 * while the slot is open.
 */
export interface Slot {
  rowId: number; // sheet row number
  event: string;
  location: string;
  contact: string;
  startAt: Date;
  endAt: Date;
  hours: number;
  firstName: string;
  lastName: string;
  email: string;
  userId: string;
  reservedAt: Date | null;
  completed: string;
  sent24h: boolean;
  sent1h: boolean;
  calendarUid: string;
}

export interface ReservingUser {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
}

export interface SlotFilter {
  upcomingOnly?: boolean;
  includeTaken?: boolean;
  search?: string;
}

/**
 * What the API exposes about a slot. Reserver identity stays private.
 */
export interface SlotView {
  rowId: number;
  event: string;
  location: string;
  contact: string;
  startAt: string;
  endAt: string;
  hours: number;
  taken: boolean;
  completed: boolean;
  reservedByMe: boolean;
}
