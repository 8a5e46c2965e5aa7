import { MalformedCodeError } from "../errors.js";

/** Width of a canonical stop code. */
export const CODE_WIDTH = 5;

const MAX_CODE = 99_999;

/** Digits with an optional all-zero fraction, as spreadsheet exports write them. */
const NUMERIC_CODE = /^(\d+)(?:\.0+)?$/;

/**
 * Canonicalize a raw stop code to its 5-digit, zero-padded form.
 *
 * "1" → "00001", 1001 → "01001", " 1001.0 " → "01001".
 *
 * @throws MalformedCodeError for empty, non-numeric, negative, fractional
 *   or out-of-range input
 */
export function normalizeCode(raw: string | number): string {
  let value: number;

  if (typeof raw === "number") {
    if (!Number.isInteger(raw) || raw < 0) {
      throw new MalformedCodeError(raw);
    }
    value = raw;
  } else {
    const match = NUMERIC_CODE.exec(raw.trim());
    if (!match?.[1]) {
      throw new MalformedCodeError(raw);
    }
    value = Number(match[1]);
  }

  if (value > MAX_CODE) {
    throw new MalformedCodeError(raw);
  }
  return String(value).padStart(CODE_WIDTH, "0");
}

/** Like {@link normalizeCode} but returns null instead of throwing. */
export function tryNormalizeCode(raw: unknown): string | null {
  if (typeof raw !== "string" && typeof raw !== "number") return null;
  try {
    return normalizeCode(raw);
  } catch (err) {
    if (err instanceof MalformedCodeError) return null;
    throw err;
  }
}
