import { type z } from 'zod';
import { AppError, toValidationIssues } from '@parley/shared';

/** Parses request input, answering 422 with field issues when it does not fit. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validation(message, toValidationIssues(parsed.error.issues));
  }
  return parsed.data;
}
