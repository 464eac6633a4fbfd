import { InvalidArgumentError } from 'commander';
import { z } from 'zod';

// Digits only, so "5abc" and "-1" are rejected rather than truncated
const LimitSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().min(1));

// commander option parser for --limit
export function parseLimit(value: string): number {
  const parsed = LimitSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed.data;
}
