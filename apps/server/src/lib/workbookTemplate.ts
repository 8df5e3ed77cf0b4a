import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import { parseDateKey, parseTimeOfDay } from '@volunteer-portal/shared';
import { DATE_NUM_FMT, TIME_NUM_FMT, toDateCell, toTimeCell } from './cells.js';
import { REQUIRED_COLUMNS } from './slotStore.js';

export type TemplateRow = {
  event: string;
  location?: string;
  date?: string; // YYYY-MM-DD
  startTime?: string; // HH:mm
  endTime?: string;
  hours?: number;
  contact?: string;
  firstName?: string;
  lastName?: string;
  completed?: string;
};

export type TemplateOptions = {
  sheetName: string;
  headerRow: number;
  title?: string;
  rows?: TemplateRow[];
};

export const TEMPLATE_HEADERS: string[] = Object.values(REQUIRED_COLUMNS);

function writeRow(sheet: Worksheet, rowNumber: number, row: TemplateRow) {
  const cells = sheet.getRow(rowNumber);
  const date = row.date ? parseDateKey(row.date) : null;
  const start = row.startTime ? parseTimeOfDay(row.startTime) : null;
  const end = row.endTime ? parseTimeOfDay(row.endTime) : null;

  cells.getCell(1).value = row.event;
  cells.getCell(2).value = row.location ?? '';
  if (date) {
    cells.getCell(3).value = toDateCell(date);
    cells.getCell(3).numFmt = DATE_NUM_FMT;
  }
  if (start) {
    cells.getCell(4).value = toTimeCell(start);
    cells.getCell(4).numFmt = TIME_NUM_FMT;
  }
  if (end) {
    cells.getCell(5).value = toTimeCell(end);
    cells.getCell(5).numFmt = TIME_NUM_FMT;
  }
  cells.getCell(6).value = row.hours ?? 1;
  cells.getCell(7).value = row.contact ?? '';
  cells.getCell(8).value = row.firstName ?? null;
  cells.getCell(9).value = row.lastName ?? null;
  cells.getCell(10).value = row.completed ?? null;
}

/**
 * Writes a sign-up workbook with the standard headers at `headerRow`
 * (title line above it) and optional pre-filled slots below.
 */
export async function createSignupWorkbook(path: string, options: TemplateOptions): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName);

  if (options.title && options.headerRow > 1) {
    sheet.getCell(1, 1).value = options.title;
  }

  const header = sheet.getRow(options.headerRow);
  TEMPLATE_HEADERS.forEach((label, i) => {
    header.getCell(i + 1).value = label;
  });
  header.font = { bold: true };

  (options.rows ?? []).forEach((row, i) => writeRow(sheet, options.headerRow + 1 + i, row));

  await workbook.xlsx.writeFile(path);
}
