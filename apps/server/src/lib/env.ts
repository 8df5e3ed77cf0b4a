import { DEFAULT_TIMEZONE } from '@volunteer-portal/shared';

export type Env = {
  PORT: string;
  ORG_NAME: string;
  TIMEZONE: string;
  WEB_ORIGIN?: string;

  // Sign-up sheet
  EXCEL_PATH: string;
  SHEET_NAME: string;
  HEADER_ROW: number;

  // Outbound email
  SMTP_HOST: string;
  SMTP_PORT: number;
  SMTP_USER: string;
  SMTP_PASS: string;
  FROM_EMAIL: string;

  // Accounts / forum
  GCP_PROJECT_ID?: string;
  JWT_SECRET?: string;
  PROFILE_PIC_DIR: string;
  FORCED_ADMIN_EMAILS: string[];
  BOOTSTRAP_ADMIN_EMAIL?: string;
  BOOTSTRAP_ADMIN_PASSWORD?: string;
  BOOTSTRAP_ADMIN_FIRST: string;
  BOOTSTRAP_ADMIN_LAST: string;

  // Cron jobs
  CRON_SECRET?: string;
};

export type SheetConfig = {
  path: string;
  sheetName: string;
  headerRow: number;
  zone: string;
};

export type SmtpConfig = {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
};

function intFromEnv(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return value && Number.isInteger(n) && n > 0 ? n : fallback;
}

function listFromEnv(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const smtpUser = source.SMTP_USER ?? '';
  return {
    PORT: source.PORT ?? '8080',
    ORG_NAME: source.ORG_NAME ?? 'Volunteer Portal',
    TIMEZONE: source.TIMEZONE ?? DEFAULT_TIMEZONE,
    WEB_ORIGIN: source.WEB_ORIGIN,

    EXCEL_PATH: source.EXCEL_PATH ?? 'Volunteer Sign Up Sheet.xlsx',
    SHEET_NAME: source.SHEET_NAME ?? 'Signups',
    HEADER_ROW: intFromEnv(source.HEADER_ROW, 3),

    SMTP_HOST: source.SMTP_HOST ?? '',
    SMTP_PORT: intFromEnv(source.SMTP_PORT, 587),
    SMTP_USER: smtpUser,
    SMTP_PASS: source.SMTP_PASS ?? '',
    FROM_EMAIL: source.FROM_EMAIL || smtpUser,

    GCP_PROJECT_ID: source.GCP_PROJECT_ID,
    JWT_SECRET: source.JWT_SECRET,
    PROFILE_PIC_DIR: source.PROFILE_PIC_DIR ?? 'profile_pics',
    FORCED_ADMIN_EMAILS: listFromEnv(source.FORCED_ADMIN_EMAILS),
    BOOTSTRAP_ADMIN_EMAIL: source.BOOTSTRAP_ADMIN_EMAIL,
    BOOTSTRAP_ADMIN_PASSWORD: source.BOOTSTRAP_ADMIN_PASSWORD,
    BOOTSTRAP_ADMIN_FIRST: source.BOOTSTRAP_ADMIN_FIRST ?? 'Admin',
    BOOTSTRAP_ADMIN_LAST: source.BOOTSTRAP_ADMIN_LAST ?? 'User',

    CRON_SECRET: source.CRON_SECRET,
  };
}

export function getSheetConfig(env: Env): SheetConfig {
  return {
    path: env.EXCEL_PATH,
    sheetName: env.SHEET_NAME,
    headerRow: env.HEADER_ROW,
    zone: env.TIMEZONE,
  };
}

export function getSmtpConfig(env: Env): SmtpConfig {
  return {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    user: env.SMTP_USER,
    pass: env.SMTP_PASS,
    from: env.FROM_EMAIL,
  };
}
