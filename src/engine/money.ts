// ── Monetary Arithmetic ─────────────────────────────────────────────
// Amounts are integer minor units (cents). Floats only appear at the
// input/output boundary; accumulation is always integer addition.

export type Cents = number;

const DECIMAL_PATTERN = /^([+-]?)(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Convert a display-boundary float into cents, rounding half away from zero.
 */
export function toCents(value: number): Cents {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Amount must be a finite number, got ${value}`);
  }
  const scaled = Math.round(Math.abs(value) * 100);
  return checkSafe(value < 0 ? -scaled : scaled);
}

/**
 * Parse a user-supplied amount.
 *
 * Strings are read digit-by-digit so no float rounding applies. Accepts
 * "1234.56", "-20", "+3.5" and the comma-decimal form "1.234,56".
 */
export function parseAmount(input: string | number): Cents {
  if (typeof input === "number") return toCents(input);

  const compact = input.trim().replace(/\s/g, "");
  // Comma present: comma is the decimal separator, dots group thousands
  const normalized = compact.includes(",")
    ? compact.replace(/\./g, "").replace(",", ".")
    : compact;

  const match = DECIMAL_PATTERN.exec(normalized);
  if (!match) {
    throw new RangeError(`Invalid amount: "${input}"`);
  }

  const [, sign, whole = "0", fraction = ""] = match;
  const cents =
    Number(whole) * 100 + Number(fraction.padEnd(2, "0"));
  return checkSafe(sign === "-" ? -cents : cents);
}

export function addCents(a: Cents, b: Cents): Cents {
  return checkSafe(a + b);
}

/** Fixed two-decimal rendering, e.g. -150050 → "-1500.50". */
export function formatCents(value: Cents): string {
  const abs = Math.abs(value);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, "0");
  return `${value < 0 ? "-" : ""}${whole}.${fraction}`;
}

/** Display-only conversion. Never feed the result back into arithmetic. */
export function centsToNumber(value: Cents): number {
  return Number(formatCents(value));
}

function checkSafe(value: number): Cents {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Amount out of range: ${value}`);
  }
  // Normalize -0
  return value === 0 ? 0 : value;
}
