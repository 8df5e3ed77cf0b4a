import { z } from 'zod';
import { parseDateKey, parseTimeOfDay } from '../utils/dates.js';

const timeOfDaySchema = z
  .string()
  .trim()
  .refine((v) => parseTimeOfDay(v) !== null, 'Invalid time (use HH:mm)');

export const addSlotRequestSchema = z.object({
  event: z.string().trim().min(1, 'Event name is required.').max(200),
  location: z.string().trim().max(200).default(''),
  date: z
    .string()
    .trim()
    .refine((v) => parseDateKey(v) !== null, 'Invalid date (use YYYY-MM-DD)'),
  startTime: timeOfDaySchema,
  endTime: timeOfDaySchema,
  hours: z.coerce.number().min(0).max(24).default(1),
  contact: z.string().trim().max(200).default(''),
});

export type AddSlotRequest = z.infer<typeof addSlotRequestSchema>;

const queryFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === 'true' || v === '1'));

export const listSlotsQuerySchema = z.object({
  upcoming: queryFlagSchema,
  includeTaken: queryFlagSchema,
  search: z.string().trim().max(200).optional(),
});

export const rowIdParamSchema = z.coerce.number().int().positive();
