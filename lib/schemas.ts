import { z } from 'zod';
import type { RealReturnQuery } from '@/types';
import { isIsoDate } from './dates';
import { DEFAULT_INITIAL_AMOUNT, MAX_INITIAL_AMOUNT, VALID_TICKER_PATTERN } from './constants';

const isoDate = z.string().refine(isIsoDate, { message: 'must be a valid YYYY-MM-DD date' });

const windowSchema = z
  .object({
    start: isoDate,
    end: isoDate,
  })
  .refine((w) => w.start <= w.end, { message: 'start must not be after end', path: ['start'] });

export const realReturnQuerySchema = z
  .object({
    ticker: z
      .string()
      .trim()
      .regex(VALID_TICKER_PATTERN, 'invalid ticker format')
      .refine((t) => !t.includes('..'), 'invalid ticker format'),
    start: isoDate,
    end: isoDate,
    amount: z.coerce
      .number()
      .positive()
      .max(MAX_INITIAL_AMOUNT)
      .default(DEFAULT_INITIAL_AMOUNT),
  })
  .refine((q) => q.start <= q.end, { message: 'start must not be after end', path: ['start'] });

export const inflationQuerySchema = windowSchema;

export type InflationQuery = z.infer<typeof inflationQuerySchema>;

type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.issues.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}

/**
 * Validate URL search params; absent params are treated as undefined
 */
function parseSearchParams<S extends z.ZodTypeAny>(
  schema: S,
  params: URLSearchParams
): ParseResult<z.output<S>> {
  const raw: Record<string, string> = {};
  for (const [key, value] of params.entries()) {
    if (value !== '') raw[key] = value;
  }

  const result = schema.safeParse(raw);
  if (result.success) return { success: true, data: result.data };
  return { success: false, error: formatIssues(result.error) };
}

export function parseRealReturnQuery(params: URLSearchParams): ParseResult<RealReturnQuery> {
  return parseSearchParams(realReturnQuerySchema, params);
}

export function parseInflationQuery(params: URLSearchParams): ParseResult<InflationQuery> {
  return parseSearchParams(inflationQuerySchema, params);
}
