import type { CalendarKind } from "../types.js";

// Indexed by month - 1; the second table is used in leap years.
const MONTH_LENGTHS: Record<CalendarKind, readonly [readonly number[], readonly number[]]> = {
  jalali: [
    [31, 31, 31, 31, 31, 31, 30, 30, 30, 30, 30, 29],
    [31, 31, 31, 31, 31, 31, 30, 30, 30, 30, 30, 30]
  ],
  gregorian: [
    [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31],
    [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  ]
};

export function monthLength(calendar: CalendarKind, month: number, leapYear: boolean): number {
  const length = MONTH_LENGTHS[calendar][leapYear ? 1 : 0][month - 1];
  if (length === undefined) {
    throw new RangeError(`month ${month} out of range`);
  }
  return length;
}

/** Days in the months preceding `month` of the same year. */
export function daysBeforeMonth(calendar: CalendarKind, month: number, leapYear: boolean): number {
  let total = 0;
  for (let m = 1; m < month; m += 1) {
    total += monthLength(calendar, m, leapYear);
  }
  return total;
}

export function isGregorianLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
