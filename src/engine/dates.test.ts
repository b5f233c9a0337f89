import { describe, expect, test } from "vitest";
import {
  addDays,
  dateAtDayOrMonthEnd,
  daysInMonth,
  diffDays,
  fromEpochDay,
  isCalendarDate,
  parseCalendarDate,
  toEpochDay,
  todayUTC,
  weekday,
} from "./dates.js";

describe("calendar dates", () => {
  test("weekday uses 0 = Sunday", () => {
    expect(weekday("2025-01-01")).toBe(3);
    expect(weekday("2025-01-05")).toBe(0);
    expect(weekday("1969-12-31")).toBe(3);
  });

  test("addDays crosses DST changes, month ends and leap days", () => {
    expect(addDays("2025-03-09", 1)).toBe("2025-03-10");
    expect(addDays("2025-11-02", 1)).toBe("2025-11-03");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(addDays("2025-01-01", -1)).toBe("2024-12-31");
  });

  test("diffDays counts whole days", () => {
    expect(diffDays("2025-01-01", "2025-03-01")).toBe(59);
    expect(diffDays("2025-03-01", "2025-01-01")).toBe(-59);
  });

  test("dateAtDayOrMonthEnd clamps to the month's last day", () => {
    expect(dateAtDayOrMonthEnd(2025, 2, 31)).toBe("2025-02-28");
    expect(dateAtDayOrMonthEnd(2024, 2, 31)).toBe("2024-02-29");
    expect(dateAtDayOrMonthEnd(2025, 4, 31)).toBe("2025-04-30");
    expect(dateAtDayOrMonthEnd(2025, 1, 15)).toBe("2025-01-15");
  });

  test("parseCalendarDate validates and strips timestamps", () => {
    expect(parseCalendarDate("2025-06-01")).toBe("2025-06-01");
    expect(parseCalendarDate("2025-06-01T23:30:00-07:00")).toBe("2025-06-01");
    expect(() => parseCalendarDate("2025-02-30")).toThrow(RangeError);
    expect(() => parseCalendarDate("06/01/2025")).toThrow(RangeError);
  });

  test("isCalendarDate rejects impossible months", () => {
    expect(isCalendarDate("2025-13-01")).toBe(false);
    expect(isCalendarDate("2024-02-29")).toBe(true);
    expect(isCalendarDate("2025-02-29")).toBe(false);
  });

  test("todayUTC ignores the local offset", () => {
    expect(todayUTC(new Date("2025-06-01T23:30:00-07:00"))).toBe("2025-06-02");
  });

  test("years 0000-0099 stay in their own century", () => {
    expect(addDays("0050-01-01", 1)).toBe("0050-01-02");
    expect(addDays("0099-12-31", 1)).toBe("0100-01-01");
    expect(toEpochDay("0001-01-01")).toBe(-719_162);
    expect(fromEpochDay(-719_162)).toBe("0001-01-01");
    expect(weekday("0050-01-01")).toBe(6);
  });

  test("leap years follow the proleptic Gregorian calendar", () => {
    expect(daysInMonth(0, 2)).toBe(29);
    expect(daysInMonth(4, 2)).toBe(29);
    expect(daysInMonth(100, 2)).toBe(28);
    expect(dateAtDayOrMonthEnd(96, 2, 31)).toBe("0096-02-29");
  });

  test("dates past 9999-12-31 are rejected", () => {
    expect(addDays("9999-12-30", 1)).toBe("9999-12-31");
    expect(() => addDays("9999-12-31", 1)).toThrow(
      "Date out of range (years 0000-9999)",
    );
    expect(() => addDays("0000-01-01", -1)).toThrow(RangeError);
  });
});
