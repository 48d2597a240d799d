/**
 * Task request schemas
 */

import { z } from 'zod';

// YYYY-MM-DD, optionally followed by a time and a Z or ±HH:MM offset
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})(?:T(\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?)(Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or date-time string. A time without an offset is read
 * as UTC, never in the server's local zone.
 * @returns The instant as an ISO-8601 UTC string, or null if the input is not a valid date
 */
export const normalizeDueDate = (value: string): string | null => {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) {
    return null;
  }

  const [, date, time, offset] = match;
  const ms = Date.parse(time ? `${date}T${time}${offset ?? 'Z'}` : `${date}T00:00:00Z`);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
};

const DueDateSchema = z
  .string()
  .transform((value, ctx) => {
    const normalized = normalizeDueDate(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected an ISO-8601 date or date-time'
      });
      return z.NEVER;
    }
    return normalized;
  })
  .nullable()
  .optional();

// Path ids are plain decimal digits; forms like 1e0 or 0x1 are rejected
export const TaskIdSchema = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/, 'Task id must be a positive integer')
    .transform(Number)
    .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER)),
});

export const CreateTaskSchema = z.object({
  title: z.string().min(1, 'Title is required').max(200),
  description: z.string().max(1000).nullable().optional(),
  due_date: DueDateSchema,
});

// Every key is optional; an absent key leaves the stored value as it is
export const UpdateTaskSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  description: z.string().max(1000).nullable().optional(),
  completed: z.boolean().optional(),
  due_date: DueDateSchema,
});
