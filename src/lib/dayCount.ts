import type { RawDateFields } from "../types.js";
import { daysBeforeMonth, isGregorianLeapYear, monthLength } from "./monthLength.js";

/**
 * Day numbers follow the Rata Die convention: Gregorian 0001-01-01 is day 1.
 */

const floorDiv = (a: number, b: number): number => Math.floor(a / b);
const mod = (a: number, b: number): number => a - b * Math.floor(a / b);

export function gregorianToDayCount(year: number, month: number, day: number): number {
  const prior = year - 1;
  return (
    365 * prior +
    floorDiv(prior, 4) -
    floorDiv(prior, 100) +
    floorDiv(prior, 400) +
    daysBeforeMonth("gregorian", month, isGregorianLeapYear(year)) +
    day
  );
}

function gregorianYearFromDayCount(dayCount: number): number {
  const d0 = dayCount - 1;
  const n400 = floorDiv(d0, 146097);
  const d1 = mod(d0, 146097);
  const n100 = floorDiv(d1, 36524);
  const d2 = mod(d1, 36524);
  const n4 = floorDiv(d2, 1461);
  const d3 = mod(d2, 1461);
  const n1 = floorDiv(d3, 365);
  const year = 400 * n400 + 100 * n100 + 4 * n4 + n1;

  // the last day of a 4- or 400-year cycle still belongs to the prior year
  return n100 === 4 || n1 === 4 ? year : year + 1;
}

export function dayCountToGregorian(dayCount: number): RawDateFields {
  const year = gregorianYearFromDayCount(dayCount);
  const leap = isGregorianLeapYear(year);
  let remaining = dayCount - gregorianToDayCount(year, 1, 1);

  let month = 1;
  while (remaining >= monthLength("gregorian", month, leap)) {
    remaining -= monthLength("gregorian", month, leap);
    month += 1;
  }

  return { year, month, day: remaining + 1 };
}
