import { randomUUID } from 'crypto';
import { DateTime } from 'luxon';
import { formatNaiveStamp } from '@volunteer-portal/shared';

export const ICS_PRODID = '-//Volunteer Portal//Signups//EN';
export const GOOGLE_CALENDAR_RENDER_URL = 'https://calendar.google.com/calendar/render';

export type InviteInput = {
  title: string;
  start: DateTime;
  end: DateTime;
  location: string;
  description: string;
  uid?: string;
  now?: DateTime;
};

export type CalendarInvite = {
  uid: string;
  ics: string;
  googleCalendarUrl: string;
};

export function escapeICS(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

const MAX_LINE_OCTETS = 75;

/**
 * Splits a content line into 75-octet pieces joined by CRLF and a space,
 * never inside a UTF-8 character.
 */
export function foldLine(line: string): string {
  const pieces: string[] = [];
  let current = '';
  let size = 0;
  for (const ch of line) {
    const octets = Buffer.byteLength(ch, 'utf8');
    // continuation lines spend one octet on the leading space
    const limit = pieces.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
    if (size + octets > limit) {
      pieces.push(current);
      current = '';
      size = 0;
    }
    current += ch;
    size += octets;
  }
  pieces.push(current);
  return pieces.join('\r\n ');
}

/**
 * "Add to Google Calendar" link. Times are wall-clock stamps without offset so
 * the calendar shows them in the viewer's zone as written.
 */
export function googleCalendarLink(
  title: string,
  start: DateTime,
  end: DateTime,
  location: string,
  details: string
): string {
  const dates = `${formatNaiveStamp(start)}/${formatNaiveStamp(end)}`;
  return (
    `${GOOGLE_CALENDAR_RENDER_URL}?action=TEMPLATE` +
    `&text=${encodeURIComponent(title)}` +
    `&dates=${dates}` +
    `&location=${encodeURIComponent(location)}` +
    `&details=${encodeURIComponent(details)}`
  );
}

export function buildInvite(input: InviteInput): CalendarInvite {
  const uid = input.uid || randomUUID();
  const stamp = input.now ?? DateTime.now().setZone(input.start.zone);

  const icsLines: string[] = [];
  icsLines.push('BEGIN:VCALENDAR');
  icsLines.push('VERSION:2.0');
  icsLines.push(`PRODID:${ICS_PRODID}`);
  icsLines.push('CALSCALE:GREGORIAN');
  icsLines.push('METHOD:PUBLISH');
  icsLines.push('BEGIN:VEVENT');
  icsLines.push(`UID:${uid}`);
  icsLines.push(`DTSTAMP:${formatNaiveStamp(stamp)}`);
  icsLines.push(`DTSTART:${formatNaiveStamp(input.start)}`);
  icsLines.push(`DTEND:${formatNaiveStamp(input.end)}`);
  icsLines.push(`SUMMARY:${escapeICS(input.title)}`);
  icsLines.push(`LOCATION:${escapeICS(input.location)}`);
  icsLines.push(`DESCRIPTION:${escapeICS(input.description)}`);
  icsLines.push('END:VEVENT');
  icsLines.push('END:VCALENDAR');

  return {
    uid,
    ics: `${icsLines.map(foldLine).join('\r\n')}\r\n`,
    googleCalendarUrl: googleCalendarLink(input.title, input.start, input.end, input.location, input.description),
  };
}
