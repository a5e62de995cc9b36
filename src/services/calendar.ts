import { describeFields } from "../lib/format.js";
import { cycle33LeapRule } from "../lib/leapYear.js";
import type { LeapYearRule } from "../lib/leapYear.js";
import { InvalidDateError, OverflowError } from "../lib/errors.js";
import { dayCountToGregorian, gregorianToDayCount } from "../lib/dayCount.js";
import { daysBeforeMonth, isGregorianLeapYear, monthLength } from "../lib/monthLength.js";
import { GREGORIAN_DELIMITER, JALALI_DELIMITER } from "../lib/parsers.js";
import type { CalendarDate, CalendarKind } from "../types.js";

// Every date from Gregorian 0001-01-01 through 9999-12-31 is representable.
export const MIN_DAY_COUNT = gregorianToDayCount(1, 1, 1);
export const MAX_DAY_COUNT = gregorianToDayCount(9999, 12, 31);

// Jalali years overlapping that span, with a year of slack for either rule.
export const JALALI_MIN_YEAR = -622;
export const JALALI_MAX_YEAR = 9379;

// 1403/01/01 fell on 2024-03-20; every other new year is counted from here.
const REFERENCE_YEAR = 1403;
const REFERENCE_NEW_YEAR = gregorianToDayCount(2024, 3, 20);

const MEAN_JALALI_YEAR = 365.2424;

const RANGE_CAUSE = "outside 0001-01-01..9999-12-31";

/**
 * Converts between the Jalali and Gregorian calendars through a shared day
 * count. Jalali year lengths come only from the leap rule the engine was
 * built with, so validation and conversion can never disagree about the
 * length of month 12.
 */
export class CalendarEngine {
  private newYears: number[] | null = null;

  constructor(readonly leapRule: LeapYearRule = cycle33LeapRule) {}

  get minDayCount(): number {
    return MIN_DAY_COUNT;
  }

  get maxDayCount(): number {
    return MAX_DAY_COUNT;
  }

  createDate(calendar: CalendarKind, year: number, month: number, day: number, input?: string): CalendarDate {
    const context = input ?? describeDate(calendar, year, month, day);

    if (![year, month, day].every(Number.isInteger)) {
      throw new InvalidDateError(context, `${calendar} date`);
    }

    if (month < 1 || month > 12) {
      throw new InvalidDateError(context, `${calendar} date`);
    }

    const leap = calendar === "jalali" ? this.leapRule.isLeapYear(year) : isGregorianLeapYear(year);
    if (day < 1 || day > monthLength(calendar, month, leap)) {
      throw new InvalidDateError(context, `${calendar} date`);
    }

    if (calendar === "jalali" && (year < JALALI_MIN_YEAR || year > JALALI_MAX_YEAR)) {
      throw new OverflowError(context, RANGE_CAUSE);
    }

    const date: CalendarDate = Object.freeze({ year, month, day, calendar });
    this.assertInRange(this.toDayCount(date), context);

    return date;
  }

  isLeapYear(date: CalendarDate): boolean {
    return date.calendar === "jalali" ? this.leapRule.isLeapYear(date.year) : isGregorianLeapYear(date.year);
  }

  toDayCount(date: CalendarDate): number {
    if (date.calendar === "gregorian") {
      return gregorianToDayCount(date.year, date.month, date.day);
    }

    const leap = this.leapRule.isLeapYear(date.year);
    return this.newYearDayCount(date.year) + daysBeforeMonth("jalali", date.month, leap) + date.day - 1;
  }

  fromDayCount(dayCount: number, calendar: CalendarKind, input?: string): CalendarDate {
    this.assertInRange(dayCount, input ?? `day ${dayCount}`);

    if (calendar === "gregorian") {
      const { year, month, day } = dayCountToGregorian(dayCount);
      return Object.freeze({ year, month, day, calendar });
    }

    const year = this.jalaliYearOf(dayCount);
    const leap = this.leapRule.isLeapYear(year);
    let remaining = dayCount - this.newYearDayCount(year);

    let month = 1;
    while (remaining >= monthLength("jalali", month, leap)) {
      remaining -= monthLength("jalali", month, leap);
      month += 1;
    }

    return Object.freeze({ year, month, day: remaining + 1, calendar });
  }

  toGregorian(date: CalendarDate): CalendarDate {
    return date.calendar === "gregorian" ? date : this.fromDayCount(this.toDayCount(date), "gregorian");
  }

  toJalali(date: CalendarDate): CalendarDate {
    return date.calendar === "jalali" ? date : this.fromDayCount(this.toDayCount(date), "jalali");
  }

  private assertInRange(dayCount: number, context: string): void {
    if (!Number.isSafeInteger(dayCount) || dayCount < this.minDayCount || dayCount > this.maxDayCount) {
      throw new OverflowError(context, RANGE_CAUSE);
    }
  }

  private jalaliYearOf(dayCount: number): number {
    let year = Math.floor((dayCount - REFERENCE_NEW_YEAR) / MEAN_JALALI_YEAR) + REFERENCE_YEAR;
    year = Math.min(Math.max(year, JALALI_MIN_YEAR), JALALI_MAX_YEAR);

    while (year < JALALI_MAX_YEAR && this.newYearDayCount(year + 1) <= dayCount) {
      year += 1;
    }
    while (year > JALALI_MIN_YEAR && this.newYearDayCount(year) > dayCount) {
      year -= 1;
    }

    return year;
  }

  private newYearDayCount(year: number): number {
    const newYears = this.newYears ?? this.buildNewYears();
    const value = newYears[year - JALALI_MIN_YEAR];
    if (value === undefined) {
      throw new RangeError(`no new year recorded for jalali year ${year}`);
    }
    return value;
  }

  /** New-year day counts for JALALI_MIN_YEAR..JALALI_MAX_YEAR + 1, indexed from JALALI_MIN_YEAR. */
  private buildNewYears(): number[] {
    const yearLength = (year: number) => (this.leapRule.isLeapYear(year) ? 366 : 365);
    const newYears = new Array<number>(JALALI_MAX_YEAR - JALALI_MIN_YEAR + 2).fill(0);
    const at = (year: number) => year - JALALI_MIN_YEAR;

    newYears[at(REFERENCE_YEAR)] = REFERENCE_NEW_YEAR;
    for (let year = REFERENCE_YEAR + 1; year <= JALALI_MAX_YEAR + 1; year += 1) {
      newYears[at(year)] = (newYears[at(year - 1)] ?? 0) + yearLength(year - 1);
    }
    for (let year = REFERENCE_YEAR - 1; year >= JALALI_MIN_YEAR; year -= 1) {
      newYears[at(year)] = (newYears[at(year + 1)] ?? 0) - yearLength(year);
    }

    this.newYears = newYears;
    return newYears;
  }
}

function describeDate(calendar: CalendarKind, year: number, month: number, day: number): string {
  return describeFields(year, month, day, calendar === "jalali" ? JALALI_DELIMITER : GREGORIAN_DELIMITER);
}

export const defaultCalendar = new CalendarEngine();
