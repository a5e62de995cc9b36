import { FormatError } from "./errors.js";
import type { RawDateFields } from "../types.js";

export const JALALI_DELIMITER = "/";
export const GREGORIAN_DELIMITER = "-";

const SIGNED_PATTERN = /^[+-]?\d+$/;
const UNSIGNED_PATTERN = /^\+?\d+$/;

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const UINT8_MAX = 255;

/**
 * Splits `input` into its year, month and day fields. Only the shape of the
 * text is checked here; whether the fields name a real day is decided when
 * the date is constructed.
 */
export function parseDateText(input: string, delimiter: string): RawDateFields {
  const segments = input.split(delimiter);
  if (segments.length !== 3) {
    throw new FormatError(input, "format");
  }

  const [yearText = "", monthText = "", dayText = ""] = segments;

  return {
    year: parseField(input, yearText, "year", SIGNED_PATTERN, INT32_MIN, INT32_MAX),
    month: parseField(input, monthText, "month", UNSIGNED_PATTERN, 0, UINT8_MAX),
    day: parseField(input, dayText, "day", UNSIGNED_PATTERN, 0, UINT8_MAX)
  };
}

function parseField(
  input: string,
  text: string,
  field: "year" | "month" | "day",
  pattern: RegExp,
  min: number,
  max: number
): number {
  if (!pattern.test(text)) {
    throw new FormatError(input, `${field} value`);
  }

  const value = Number(text);
  if (value < min || value > max) {
    throw new FormatError(input, `${field} value`);
  }

  // "-0" parses to negative zero
  return value === 0 ? 0 : value;
}
