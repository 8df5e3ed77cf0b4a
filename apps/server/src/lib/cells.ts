import type { CellValue } from 'exceljs';
import { DateTime } from 'luxon';
import { parseDateKey, parseTimeOfDay, type LocalDate, type LocalTime } from '@volunteer-portal/shared';

// Spreadsheet dates carry no zone: exceljs hands them back as UTC instants
// whose UTC fields are the wall-clock values typed into the sheet.
const EXCEL_EPOCH_UTC = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 86_400_000;

export const DATE_NUM_FMT = 'yyyy-mm-dd';
export const TIME_NUM_FMT = 'h:mm AM/PM';
export const TIMESTAMP_NUM_FMT = 'yyyy-mm-dd hh:mm:ss';

function scalarText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  return '';
}

/**
 * Text content of a cell, trimmed. Formula cells yield their cached result.
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value !== 'object' || value instanceof Date) return scalarText(value);
  if ('richText' in value) return value.richText.map((part) => part.text).join('').trim();
  if ('hyperlink' in value) return scalarText(value.text);
  if ('result' in value) return scalarText(value.result);
  return '';
}

export function isBlankCell(value: CellValue): boolean {
  return cellText(value) === '';
}

export function cellNumber(value: CellValue): number {
  if (typeof value === 'number') return value;
  const n = Number(cellText(value));
  return Number.isFinite(n) ? n : 0;
}

const TRUE_WORDS = new Set(['true', 'yes', 'y', '1', 'x']);

export function cellFlag(value: CellValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return TRUE_WORDS.has(cellText(value).toLowerCase());
}

function unwrapFormula(value: CellValue): CellValue {
  if (value && typeof value === 'object' && !(value instanceof Date) && 'result' in value) {
    const result = value.result;
    if (result === undefined || result === null) return null;
    if (result instanceof Date || typeof result !== 'object') return result;
    return null;
  }
  return value;
}

export function cellDate(value: CellValue): LocalDate | null {
  const v = unwrapFormula(value);
  if (v instanceof Date) {
    return { year: v.getUTCFullYear(), month: v.getUTCMonth() + 1, day: v.getUTCDate() };
  }
  if (typeof v === 'number' && v >= 1) {
    return cellDate(new Date(EXCEL_EPOCH_UTC + Math.floor(v) * MS_PER_DAY));
  }
  return parseDateKey(cellText(v));
}

export function cellTime(value: CellValue): LocalTime | null {
  const v = unwrapFormula(value);
  if (v instanceof Date) {
    return { hour: v.getUTCHours(), minute: v.getUTCMinutes(), second: v.getUTCSeconds() };
  }
  if (typeof v === 'number' && v >= 0 && v < 1) {
    const totalSeconds = Math.round(v * 86_400);
    return {
      hour: Math.floor(totalSeconds / 3600) % 24,
      minute: Math.floor(totalSeconds / 60) % 60,
      second: totalSeconds % 60,
    };
  }
  return parseTimeOfDay(cellText(v));
}

/**
 * Reads a timestamp cell as a wall-clock time in `zone`
 */
export function cellTimestamp(value: CellValue, zone: string): Date | null {
  const v = unwrapFormula(value);
  if (v instanceof Date) {
    const dt = DateTime.fromObject(
      {
        year: v.getUTCFullYear(),
        month: v.getUTCMonth() + 1,
        day: v.getUTCDate(),
        hour: v.getUTCHours(),
        minute: v.getUTCMinutes(),
        second: v.getUTCSeconds(),
      },
      { zone }
    );
    return dt.isValid ? dt.toJSDate() : null;
  }
  const text = cellText(v);
  if (!text) return null;
  const parsed = DateTime.fromISO(text, { zone });
  return parsed.isValid ? parsed.toJSDate() : null;
}

export function toDateCell(date: LocalDate): Date {
  return new Date(Date.UTC(date.year, date.month - 1, date.day));
}

export function toTimeCell(time: LocalTime): Date {
  return new Date(EXCEL_EPOCH_UTC + ((time.hour * 60 + time.minute) * 60 + time.second) * 1000);
}

export function toTimestampCell(dt: DateTime): Date {
  return new Date(Date.UTC(dt.year, dt.month - 1, dt.day, dt.hour, dt.minute, dt.second));
}
