import { z } from 'zod';

export const variantPrecedenceSchema = z.enum(['sub-table-first', 'single-letter-first']);

export const decoderOptionsSchema = z.object({
  variantPrecedence: variantPrecedenceSchema.default('sub-table-first'),
});

export const displayOptionsSchema = z.object({
  includeRemarks: z.boolean().default(false),
});

export type DecoderOptionsInput = z.input<typeof decoderOptionsSchema>;

export type DisplayOptionsInput = z.input<typeof displayOptionsSchema>;

export const rawReportSchema = z.string().transform((value) => value.trim());

// A-Z then 0-9, matching the ident alphabet
export const stationSchema = z.string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.string().regex(/^[A-Z0-9]{4}$/, 'Station must be 4 characters from A-Z or 0-9'));

export const identSchema = z.array(z.number().int().min(0).max(35)).length(4);
