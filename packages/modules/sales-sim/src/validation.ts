import { z } from 'zod';
import { ValidationError } from '@salesim/shared';

export const generateSalesHistorySchema = z.object({
  clearExisting: z.boolean().default(false),
  seed: z.number().int().optional(),
  windowDays: z.number().int().min(1).max(3650).optional(),
});
export type GenerateSalesHistoryInput = z.input<typeof generateSalesHistorySchema>;

export const backfillCatalogMetricsSchema = z.object({
  /** 0 means every item. */
  limit: z.number().int().min(0).default(0),
  seed: z.number().int().optional(),
});
export type BackfillCatalogMetricsInput = z.input<typeof backfillCatalogMetricsSchema>;

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Validation failed',
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}

/** Reads an integer `--name=<n>` flag value. Absent is undefined; blank or non-integer text is rejected. */
export function parseIntegerFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(`--${name} must be an integer`, [
      { field: name, message: `got "${value}"` },
    ]);
  }
  return Number(trimmed);
}
