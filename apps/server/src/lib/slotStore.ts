import ExcelJS from 'exceljs';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import type { DateTime } from 'luxon';
import { shiftInterval, type LocalDate, type LocalTime, type Slot } from '@volunteer-portal/shared';
import {
  cellDate,
  cellFlag,
  cellNumber,
  cellText,
  cellTime,
  cellTimestamp,
  DATE_NUM_FMT,
  isBlankCell,
  TIME_NUM_FMT,
  TIMESTAMP_NUM_FMT,
  toDateCell,
  toTimeCell,
  toTimestampCell,
} from './cells.js';
import type { SheetConfig } from './env.js';
import { describeError, PortalError } from './errors.js';

export const REQUIRED_COLUMNS = {
  event: 'EVENT',
  location: 'LOCATION',
  date: 'DATE',
  startTime: 'START TIME',
  endTime: 'END TIME',
  hours: 'HOURS',
  contact: 'CONTACT PERSON',
  firstName: 'FIRST NAME',
  lastName: 'LAST NAME',
  completed: 'COMPLETED',
} as const;

// Appended to the header row the first time a sheet is opened
export const TRACKING_COLUMNS = {
  email: 'EMAIL',
  userId: 'USER_ID',
  reservedAt: 'RESERVED_AT',
  sent24h: 'SENT_24H',
  sent1h: 'SENT_1H',
  calendarUid: 'GCAL_UID',
} as const;

export type SlotField = keyof typeof REQUIRED_COLUMNS | keyof typeof TRACKING_COLUMNS;

/**
 * Logical field -> 1-based column number, resolved from header labels on
 * every load so that columns can be reordered in the sheet.
 */
export type ColumnMap = Record<SlotField, number>;

/**
 * Header labels (trimmed, upper-cased) -> column number
 */
export function readHeaders(sheet: Worksheet, headerRow: number): Map<string, number> {
  const headers = new Map<string, number>();
  const row = sheet.getRow(headerRow);
  for (let col = 1; col <= sheet.columnCount; col++) {
    const label = cellText(row.getCell(col).value).toUpperCase();
    if (label) headers.set(label, col);
  }
  return headers;
}

/**
 * Adds any missing tracking column after the last labelled header.
 * Returns the labels it added; a second call on the same sheet adds nothing.
 */
export function ensureTrackingColumns(sheet: Worksheet, headerRow: number): string[] {
  const headers = readHeaders(sheet, headerRow);
  let next = Math.max(0, ...headers.values()) + 1;
  const added: string[] = [];
  for (const label of Object.values(TRACKING_COLUMNS)) {
    if (headers.has(label)) continue;
    sheet.getRow(headerRow).getCell(next).value = label;
    added.push(label);
    next++;
  }
  return added;
}

export function resolveColumns(sheet: Worksheet, headerRow: number): ColumnMap {
  const headers = readHeaders(sheet, headerRow);
  const column = (label: string): number => {
    const col = headers.get(label);
    if (col === undefined) {
      throw new PortalError(
        'MISSING_REQUIRED_COLUMN',
        `Column "${label}" not found in header row ${headerRow} of sheet "${sheet.name}"`
      );
    }
    return col;
  };

  return {
    event: column(REQUIRED_COLUMNS.event),
    location: column(REQUIRED_COLUMNS.location),
    date: column(REQUIRED_COLUMNS.date),
    startTime: column(REQUIRED_COLUMNS.startTime),
    endTime: column(REQUIRED_COLUMNS.endTime),
    hours: column(REQUIRED_COLUMNS.hours),
    contact: column(REQUIRED_COLUMNS.contact),
    firstName: column(REQUIRED_COLUMNS.firstName),
    lastName: column(REQUIRED_COLUMNS.lastName),
    completed: column(REQUIRED_COLUMNS.completed),
    email: column(TRACKING_COLUMNS.email),
    userId: column(TRACKING_COLUMNS.userId),
    reservedAt: column(TRACKING_COLUMNS.reservedAt),
    sent24h: column(TRACKING_COLUMNS.sent24h),
    sent1h: column(TRACKING_COLUMNS.sent1h),
    calendarUid: column(TRACKING_COLUMNS.calendarUid),
  };
}

/**
 * In-memory view of the sign-up worksheet addressed by logical field.
 */
export class SlotSheet {
  constructor(
    readonly worksheet: Worksheet,
    readonly columns: ColumnMap,
    readonly headerRow: number,
    readonly zone: string
  ) {}

  get firstDataRow(): number {
    return this.headerRow + 1;
  }

  get lastRow(): number {
    return this.worksheet.rowCount;
  }

  read(row: number, field: SlotField): CellValue {
    return this.worksheet.getCell(row, this.columns[field]).value;
  }

  text(row: number, field: SlotField): string {
    return cellText(this.read(row, field));
  }

  write(row: number, field: SlotField, value: CellValue, numFmt?: string): void {
    const cell = this.worksheet.getCell(row, this.columns[field]);
    cell.value = value;
    if (numFmt) cell.numFmt = numFmt;
  }

  writeDate(row: number, field: SlotField, date: LocalDate): void {
    this.write(row, field, toDateCell(date), DATE_NUM_FMT);
  }

  writeTime(row: number, field: SlotField, time: LocalTime): void {
    this.write(row, field, toTimeCell(time), TIME_NUM_FMT);
  }

  writeTimestamp(row: number, field: SlotField, dt: DateTime): void {
    this.write(row, field, toTimestampCell(dt.setZone(this.zone)), TIMESTAMP_NUM_FMT);
  }

  /**
   * Parses one row. Rows without an event name or with an incomplete
   * date/start/end are not slots.
   */
  slotAt(row: number): Slot | null {
    if (row < this.firstDataRow || row > this.lastRow) return null;

    const event = this.text(row, 'event');
    if (!event) return null;

    const date = cellDate(this.read(row, 'date'));
    const startTime = cellTime(this.read(row, 'startTime'));
    const endTime = cellTime(this.read(row, 'endTime'));
    if (!date || !startTime || !endTime) return null;

    const { start, end } = shiftInterval(date, startTime, endTime, this.zone);
    if (!start.isValid || !end.isValid) return null;

    return {
      rowId: row,
      event,
      location: this.text(row, 'location'),
      contact: this.text(row, 'contact'),
      startAt: start.toJSDate(),
      endAt: end.toJSDate(),
      hours: cellNumber(this.read(row, 'hours')),
      firstName: this.text(row, 'firstName'),
      lastName: this.text(row, 'lastName'),
      email: this.text(row, 'email'),
      userId: this.text(row, 'userId'),
      reservedAt: cellTimestamp(this.read(row, 'reservedAt'), this.zone),
      completed: this.text(row, 'completed'),
      sent24h: cellFlag(this.read(row, 'sent24h')),
      sent1h: cellFlag(this.read(row, 'sent1h')),
      calendarUid: this.text(row, 'calendarUid'),
    };
  }

  slots(): Slot[] {
    const slots: Slot[] = [];
    for (let row = this.firstDataRow; row <= this.lastRow; row++) {
      const slot = this.slotAt(row);
      if (slot) slots.push(slot);
    }
    return slots;
  }

  /**
   * First row below the header whose event, date and start time are all
   * blank, or the row after the last used one.
   */
  nextFreeRow(): number {
    for (let row = this.firstDataRow; row <= this.lastRow; row++) {
      if (
        isBlankCell(this.read(row, 'event')) &&
        isBlankCell(this.read(row, 'date')) &&
        isBlankCell(this.read(row, 'startTime'))
      ) {
        return row;
      }
    }
    return Math.max(this.lastRow, this.headerRow) + 1;
  }
}

export type SheetTransaction<T> = {
  save: boolean;
  value: T;
};

/**
 * Spreadsheet-backed slot table.
 *
 * Every call reads the whole workbook from disk, and a transaction that asks
 * to save writes the whole workbook back. Transactions on one instance run one
 * at a time. Nothing is locked across processes: when the portal and a
 * separate reminder process write at the same time, the last save wins and
 * the other change is lost.
 */
export class SlotStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(readonly config: SheetConfig) {}

  get zone(): string {
    return this.config.zone;
  }

  async listSlots(): Promise<Slot[]> {
    return this.transact((sheet) => ({ save: false, value: sheet.slots() }));
  }

  async getSlot(rowId: number): Promise<Slot | null> {
    return this.transact((sheet) => ({ save: false, value: sheet.slotAt(rowId) }));
  }

  /**
   * Load, run `fn` against the in-memory sheet, then save when `fn` asks to
   * or when tracking columns had to be added on load.
   */
  transact<T>(fn: (sheet: SlotSheet) => SheetTransaction<T> | Promise<SheetTransaction<T>>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(fn));
    // errors reach the caller through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runTransaction<T>(
    fn: (sheet: SlotSheet) => SheetTransaction<T> | Promise<SheetTransaction<T>>
  ): Promise<T> {
    const { workbook, sheet, provisioned } = await this.load();
    const result = await fn(sheet);
    if (result.save || provisioned) await this.save(workbook);
    return result.value;
  }

  private async load(): Promise<{ workbook: Workbook; sheet: SlotSheet; provisioned: boolean }> {
    const { path, sheetName, headerRow, zone } = this.config;
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(path);
    } catch (e) {
      throw new PortalError('FILE_LOAD_FAILURE', `Could not open sign-up sheet "${path}": ${describeError(e)}`, {
        cause: e,
      });
    }

    const worksheet = workbook.getWorksheet(sheetName);
    if (!worksheet) {
      throw new PortalError('FILE_LOAD_FAILURE', `Sheet "${sheetName}" not found in "${path}"`);
    }

    const added = ensureTrackingColumns(worksheet, headerRow);
    if (added.length > 0) {
      console.log(`[sheet] Added tracking columns to "${sheetName}":`, added.join(', '));
    }
    const columns = resolveColumns(worksheet, headerRow);

    return {
      workbook,
      sheet: new SlotSheet(worksheet, columns, headerRow, zone),
      provisioned: added.length > 0,
    };
  }

  private async save(workbook: Workbook): Promise<void> {
    try {
      await workbook.xlsx.writeFile(this.config.path);
    } catch (e) {
      throw new PortalError('FILE_SAVE_FAILURE', `Could not save sign-up sheet "${this.config.path}": ${describeError(e)}`, {
        cause: e,
      });
    }
  }
}
