// ── Series Validation ───────────────────────────────────────────────
// Every recurring series passes through here before it is stored, so
// expansion can assume a well-formed rule.

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { parseAmount } from "./money.js";
import { parseCalendarDate } from "./dates.js";
import { DIRECTIONS, INTERVALS, type NewRecurringSeries } from "./types.js";

const calendarDate = z.string().transform((value, ctx) => {
  try {
    return parseCalendarDate(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
      fatal: true,
    });
    return z.NEVER;
  }
});

const positiveAmount = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    let cents: number;
    try {
      cents = parseAmount(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
        fatal: true,
      });
      return z.NEVER;
    }
    if (cents <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "amount must be greater than zero",
        fatal: true,
      });
      return z.NEVER;
    }
    return cents;
  });

const SeriesInputSchema = z
  .object({
    description: z.string().trim().min(1, "description is required").max(200),
    direction: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(
        z.enum(DIRECTIONS, {
          errorMap: () => ({ message: "expected income|expense" }),
        }),
      ),
    amount: positiveAmount,
    startDate: calendarDate,
    interval: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(
        z.enum(INTERVALS, {
          errorMap: () => ({
            message: "invalid interval (expected weekly|biweekly|monthly|yearly)",
          }),
        }),
      ),
    dayOfWeek: z.number().int().min(0).max(6).nullish(),
    dayOfMonth: z.number().int().min(1).max(31).nullish(),
    endDate: calendarDate.nullish(),
    active: z.boolean().default(true),
  })
  .superRefine((series, ctx) => {
    if (series.endDate && series.endDate < series.startDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: "endDate must not be before startDate",
      });
    }
  });

/**
 * Validate caller-supplied series fields.
 *
 * @throws ConfigurationError listing every failed field
 */
export function parseSeriesInput(input: unknown): NewRecurringSeries {
  const parsed = SeriesInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid recurring series",
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }

  const s = parsed.data;
  return {
    description: s.description,
    direction: s.direction,
    amount: s.amount,
    startDate: s.startDate,
    interval: s.interval,
    dayOfWeek: s.dayOfWeek ?? null,
    dayOfMonth: s.dayOfMonth ?? null,
    endDate: s.endDate ?? null,
    active: s.active,
  };
}
