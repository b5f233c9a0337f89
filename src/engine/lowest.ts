import { EmptyInputError } from "./errors.js";
import type { ForecastDay, LowestPoint } from "./types.js";

/**
 * Leftmost day with the minimum cumulative balance.
 *
 * @throws EmptyInputError when `days` is empty
 */
export function findLowestPoint(days: readonly ForecastDay[]): LowestPoint {
  const [first] = days;
  if (first === undefined) throw new EmptyInputError();

  let lowest: LowestPoint = { day: first, index: 0 };
  days.forEach((day, index) => {
    // Strict comparison keeps the earliest day on ties
    if (day.balance < lowest.day.balance) lowest = { day, index };
  });
  return lowest;
}
