import { describe, expect, test } from "vitest";
import { parseSeriesInput } from "./series.js";
import { ConfigurationError } from "./errors.js";

const valid = {
  description: "Rent",
  direction: "expense",
  amount: "1450.00",
  startDate: "2025-01-01",
  interval: "monthly",
};

function issuesFor(input: unknown): string[] {
  try {
    parseSeriesInput(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error("expected parseSeriesInput to throw");
}

describe("parseSeriesInput", () => {
  test("normalizes a valid series", () => {
    expect(parseSeriesInput(valid)).toEqual({
      description: "Rent",
      direction: "expense",
      amount: 145_000,
      startDate: "2025-01-01",
      interval: "monthly",
      dayOfWeek: null,
      dayOfMonth: null,
      endDate: null,
      active: true,
    });
  });

  test("interval and direction are trimmed and case-insensitive", () => {
    const series = parseSeriesInput({
      ...valid,
      interval: " BiWeekly ",
      direction: "Income",
      dayOfWeek: 5,
      active: false,
    });
    expect(series.interval).toBe("biweekly");
    expect(series.direction).toBe("income");
    expect(series.dayOfWeek).toBe(5);
    expect(series.active).toBe(false);
  });

  test("rejects an unknown interval with ConfigurationError", () => {
    expect(() => parseSeriesInput({ ...valid, interval: "daily" })).toThrow(
      ConfigurationError,
    );
    expect(issuesFor({ ...valid, interval: "daily" })).toEqual([
      "interval: invalid interval (expected weekly|biweekly|monthly|yearly)",
    ]);
  });

  test("rejects out-of-range day pins", () => {
    const issues = issuesFor({ ...valid, dayOfWeek: 7, dayOfMonth: 0 });
    expect(issues).toHaveLength(2);
    expect(issues[0]?.startsWith("dayOfWeek:")).toBe(true);
    expect(issues[1]?.startsWith("dayOfMonth:")).toBe(true);
  });

  test("rejects non-positive and over-precise amounts", () => {
    expect(issuesFor({ ...valid, amount: 0 })).toEqual([
      "amount: amount must be greater than zero",
    ]);
    expect(issuesFor({ ...valid, amount: "-5" })).toEqual([
      "amount: amount must be greater than zero",
    ]);
    expect(issuesFor({ ...valid, amount: "12.345" })).toEqual([
      'amount: Invalid amount: "12.345"',
    ]);
  });

  test("rejects bad dates and an end before the start", () => {
    expect(issuesFor({ ...valid, startDate: "2025-02-30" })).toEqual([
      "startDate: Unable to parse date: 2025-02-30",
    ]);
    expect(issuesFor({ ...valid, endDate: "2024-12-31" })).toEqual([
      "endDate: endDate must not be before startDate",
    ]);
  });

  test("reports a missing description", () => {
    expect(issuesFor({ ...valid, description: "   " })).toEqual([
      "description: description is required",
    ]);
  });
});
