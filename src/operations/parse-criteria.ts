import { z } from 'zod';

import { UsageError } from '../errors';
import type { FilterCriteria } from '../types';
import { endOfDay, parseIsoDate } from '../utils/date-util';

// Bot (`name[bot]`) and enterprise managed-user (`name_short`) logins are valid
// authors, so only characters that would split the search qualifier are refused.
const QUALIFIER_SAFE = /^[^\s:"]+$/;

const MAX_LOGIN_LENGTH = 64;

const isoDateSchema = (flag: string) =>
  z
    .string({ required_error: `--${flag} is required` })
    .trim()
    .transform((value, ctx) => {
      const date = parseIsoDate(value);
      if (!date) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `--${flag} must be a date in YYYY-MM-DD format, got "${value}"`,
        });
        return z.NEVER;
      }
      return date;
    });

const criteriaSchema = z
  .object({
    user: z
      .string({ required_error: '--user is required' })
      .trim()
      .min(1, '--user must not be empty')
      .max(MAX_LOGIN_LENGTH, `--user must be at most ${MAX_LOGIN_LENGTH} characters`)
      .regex(QUALIFIER_SAFE, '--user must not contain whitespace, ":" or \'"\''),
    start: isoDateSchema('start'),
    end: isoDateSchema('end'),
    label: z.string().trim().min(1, '--label must not be empty').optional(),
  })
  .transform((value, ctx): FilterCriteria => {
    if (value.start.getTime() > value.end.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '--start must not be after --end',
      });
      return z.NEVER;
    }
    return {
      user: value.user,
      from: value.start,
      to: endOfDay(value.end),
      label: value.label,
    };
  });

export type RawCriteria = Partial<Record<'user' | 'start' | 'end' | 'label', string>>;

/**
 * Validates the command line flags into the criteria for one run.
 *
 * @throws {@link UsageError} naming every problem found
 */
export const parseCriteria = (raw: RawCriteria): FilterCriteria => {
  const result = criteriaSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
};
