/**
 * Schema building blocks shared by the rule variants
 *
 * User-authored configuration often comes from HTML forms, so integers may
 * arrive as numeric strings. They are coerced before range checks run.
 */

import { z } from 'zod';

const NUMERIC_STRING = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * Turns a numeric string into a number; leaves anything else alone
 */
export function coerceNumericString(value: unknown): unknown {
  if (typeof value === 'string' && NUMERIC_STRING.test(value)) {
    return Number(value);
  }
  return value;
}

/**
 * Integer accepting numeric strings, with an optional lower bound
 */
export function coercedInteger(minimum?: number) {
  let schema = z
    .number({ invalid_type_error: 'Must be an integer', required_error: 'Required' })
    .int('Must be an integer');

  if (minimum !== undefined) {
    schema = schema.min(minimum, `Must be at least ${minimum}`);
  }

  return z.preprocess(coerceNumericString, schema);
}

/**
 * Non-empty list of unique positive integer ids
 */
export function idListSchema(maxItems: number) {
  return z
    .array(coercedInteger(1), { invalid_type_error: 'Must be a list of ids' })
    .min(1, 'Must contain at least 1 id')
    .max(maxItems, `Must contain at most ${maxItems} ids`)
    .refine((ids) => new Set(ids).size === ids.length, { message: 'Ids must be unique' });
}

/**
 * 24-hour HH:MM time of day
 */
export const TIME_OF_DAY_PATTERN = /^([01][0-9]|2[0-3]):[0-5][0-9]$/;

export const TimeOfDaySchema = z
  .string({ invalid_type_error: 'Must be a time in HH:MM format' })
  .regex(TIME_OF_DAY_PATTERN, 'Must be a time in HH:MM format');

export const UnixSecondsSchema = z.number().int();
