import type { CalendarDate } from "../types.js";
import { GREGORIAN_DELIMITER, JALALI_DELIMITER } from "./parsers.js";

export function formatDateText(date: CalendarDate): string {
  const delimiter = date.calendar === "jalali" ? JALALI_DELIMITER : GREGORIAN_DELIMITER;

  return describeFields(date.year, date.month, date.day, delimiter);
}

/** Years before 1 keep their sign ahead of the padding: `-0621/10/11`. */
export function describeFields(year: number, month: number, day: number, delimiter: string): string {
  const yearText = year < 0 ? `-${pad(-year, 4)}` : pad(year, 4);
  return [yearText, pad(month, 2), pad(day, 2)].join(delimiter);
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}
