import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { SendMailOptions } from 'nodemailer';
import type { SheetConfig, SmtpConfig } from '../lib/env.js';
import { Mailer, type MailTransport } from '../lib/mailer.js';
import { SlotStore } from '../lib/slotStore.js';
import { createSignupWorkbook, type TemplateRow } from '../lib/workbookTemplate.js';

export const TEST_ZONE = 'UTC';

export const TEST_SMTP: SmtpConfig = {
  host: 'smtp.test.invalid',
  port: 587,
  user: 'portal@test.invalid',
  pass: 'test-secret',
  from: 'portal@test.invalid',
};

export type TempSheet = {
  dir: string;
  config: SheetConfig;
  store: SlotStore;
  cleanup: () => Promise<void>;
};

/**
 * Sign-up workbook in a fresh temp dir, headers on row 3 like the real sheet
 */
export async function createTempSheet(rows: TemplateRow[]): Promise<TempSheet> {
  const dir = await mkdtemp(join(tmpdir(), 'volunteer-portal-'));
  const config: SheetConfig = {
    path: join(dir, 'signups.xlsx'),
    sheetName: 'Signups',
    headerRow: 3,
    zone: TEST_ZONE,
  };
  await createSignupWorkbook(config.path, {
    sheetName: config.sheetName,
    headerRow: config.headerRow,
    title: 'Test Sign Up Sheet',
    rows,
  });
  return {
    dir,
    config,
    store: new SlotStore(config),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Transport that keeps every message instead of sending it. Addresses listed
 * in `rejecting` fail like an SMTP server refusing the recipient.
 */
export class RecordingTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];
  readonly rejecting = new Set<string>();

  async sendMail(message: SendMailOptions): Promise<unknown> {
    if (typeof message.to === 'string' && this.rejecting.has(message.to)) {
      throw new Error(`550 mailbox unavailable: ${message.to}`);
    }
    this.sent.push(message);
    return { messageId: `<${this.sent.length}@test.invalid>` };
  }
}

export function createTestMailer(config: SmtpConfig = TEST_SMTP) {
  const transport = new RecordingTransport();
  return { transport, mailer: new Mailer(config, transport) };
}
