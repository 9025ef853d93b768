import { z } from 'zod';

// Local date-time, no zone: "YYYY-MM-DD", "YYYY-MM-DDTHH:MM", "YYYY-MM-DDTHH:MM:SS[.fff]"
const localDateTimeRegex =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?$/;
const localDateRegex = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a zone-less date(-time) into a Date whose UTC fields hold the wall-clock value.
 * Returns null for out-of-range fields such as February 30th.
 */
export function parseLocalDateTime(value: string): Date | null {
  const match = localDateTimeRegex.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map((part) => (part === undefined ? 0 : parseInt(part, 10)));
  const millis = match[7] === undefined ? 0 : parseInt(match[7].padEnd(3, '0'), 10);

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;

  return roundTrips ? date : null;
}

const localDateTimeSchema = z.string().transform((value, ctx) => {
  const date = parseLocalDateTime(value);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Invalid date-time. Expected YYYY-MM-DDTHH:MM:SS',
    });
    return z.NEVER;
  }
  return date;
});

const localDateSchema = z
  .string()
  .regex(localDateRegex, 'Invalid date. Expected YYYY-MM-DD')
  .pipe(localDateTimeSchema);

/** About 270 years: keeps every cursor well inside the range a Date can hold. */
export const MAX_DURATION_DAYS = 100_000;

export const chartItemSchema = z.object({
  title: z.string(),
  duration: z.number().int().nonnegative().max(MAX_DURATION_DAYS).optional(),
  resource: z.number().int().nonnegative().optional(),
  startDate: localDateTimeSchema.optional(),
  open: z.boolean().optional(),
});

export type ChartItemInput = z.input<typeof chartItemSchema>;

export const chartSchema = z.object({
  title: z.string(),
  markedDate: localDateSchema.optional(),
  resources: z.array(z.string()),
  items: z.array(chartItemSchema),
});

export type ChartInput = z.input<typeof chartSchema>;
export type ParsedChart = z.output<typeof chartSchema>;

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// An empty query value (`?titleWidth=`) counts as not given
const widthOverride = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.coerce.number().finite().nonnegative().optional(),
);

// Query-string overrides for the configured rendering defaults
export const renderOptionsSchema = z.object({
  titleWidth: widthOverride,
  maxMonthWidth: widthOverride,
  resourceTable: booleanString.optional(),
});

export type RenderOptionsQuery = z.infer<typeof renderOptionsSchema>;
