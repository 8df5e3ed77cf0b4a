import type express from 'express';
import type { z } from 'zod';
import { httpStatusFor, isPortalError, type Outcome } from './errors.js';

/**
 * Parses a request part with a shared schema. Answers 400 with the first
 * issue's message and resolves null when it does not validate.
 */
export function parseOr400<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  res: express.Response
): z.output<S> | null {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const message = parsed.error.issues[0]?.message ?? 'Invalid request';
  res.status(400).json({ error: message, code: 'INVALID_INPUT' });
  return null;
}

export function sendOutcome<T>(
  res: express.Response,
  outcome: Outcome<T>,
  body: (value: T) => Record<string, unknown> = () => ({})
): express.Response {
  if (!outcome.ok) {
    return res.status(httpStatusFor(outcome.code)).json({ error: outcome.message, code: outcome.code });
  }
  return res.json({ success: true, message: outcome.message, ...body(outcome.value) });
}

/**
 * Route-boundary error handler: coded errors map to their status, anything
 * else is logged and answered with 500.
 */
export function sendError(res: express.Response, e: unknown, context: string): express.Response {
  if (isPortalError(e)) {
    console.error(`[server] ${context}: ${e.code} ${e.message}`);
    return res.status(httpStatusFor(e.code)).json({ error: e.message, code: e.code });
  }
  console.error(`[server] ${context}:`, e);
  return res.status(500).json({ error: 'Internal error' });
}
