export type PortalErrorCode =
  // reservations
  | 'ALREADY_TAKEN'
  | 'NOT_OWNER'
  | 'ALREADY_COMPLETED'
  | 'SLOT_NOT_FOUND'
  | 'INVALID_SLOT'
  // email
  | 'SMTP_NOT_CONFIGURED'
  | 'SMTP_SEND_FAILURE'
  // sheet
  | 'FILE_LOAD_FAILURE'
  | 'FILE_SAVE_FAILURE'
  | 'MISSING_REQUIRED_COLUMN'
  // accounts
  | 'INVALID_INPUT'
  | 'EMAIL_TAKEN'
  | 'INVALID_CREDENTIALS'
  | 'USER_NOT_FOUND'
  | 'FORCED_ADMIN'
  // forum
  | 'POST_NOT_FOUND'
  | 'THREAD_LOCKED'
  | 'REPLY_NOT_FOUND';

export class PortalError extends Error {
  readonly code: PortalErrorCode;

  constructor(code: PortalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PortalError';
    this.code = code;
  }
}

export function isPortalError(e: unknown): e is PortalError {
  return e instanceof PortalError;
}

/**
 * Business-rule outcome. Rule violations come back as values; only
 * infrastructure failures are thrown.
 */
export type Outcome<T> =
  | { ok: true; value: T; message: string }
  | { ok: false; code: PortalErrorCode; message: string };

export function succeed<T>(value: T, message: string): Outcome<T> {
  return { ok: true, value, message };
}

export function fail<T = never>(code: PortalErrorCode, message: string): Outcome<T> {
  return { ok: false, code, message };
}

const HTTP_STATUS: Record<PortalErrorCode, number> = {
  ALREADY_TAKEN: 409,
  NOT_OWNER: 403,
  ALREADY_COMPLETED: 422,
  SLOT_NOT_FOUND: 404,
  INVALID_SLOT: 400,
  SMTP_NOT_CONFIGURED: 503,
  SMTP_SEND_FAILURE: 502,
  FILE_LOAD_FAILURE: 503,
  FILE_SAVE_FAILURE: 503,
  MISSING_REQUIRED_COLUMN: 503,
  INVALID_INPUT: 400,
  EMAIL_TAKEN: 409,
  INVALID_CREDENTIALS: 401,
  USER_NOT_FOUND: 404,
  FORCED_ADMIN: 422,
  POST_NOT_FOUND: 404,
  THREAD_LOCKED: 422,
  REPLY_NOT_FOUND: 404,
};

export function httpStatusFor(code: PortalErrorCode): number {
  return HTTP_STATUS[code];
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
