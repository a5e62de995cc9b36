import { formatDateText } from "../lib/format.js";
import { GREGORIAN_DELIMITER, JALALI_DELIMITER, parseDateText } from "../lib/parsers.js";
import type { CalendarDate, PeriodState } from "../types.js";
import { addDays, addMonths, diffDays, diffDaysWithAdjustment } from "./arithmetic.js";
import { CalendarEngine, defaultCalendar } from "./calendar.js";
import { classifyPeriod } from "./period.js";

interface DateOperationsDeps {
  engine?: CalendarEngine;
  clock?: () => Date;
}

/**
 * Text-in, text-out date functions. Jalali dates are written `YYYY/MM/DD`
 * and Gregorian dates `YYYY-MM-DD`; every call parses, validates and
 * computes from scratch.
 */
export class DateOperations {
  readonly engine: CalendarEngine;
  private readonly clock: () => Date;

  constructor(deps: DateOperationsDeps = {}) {
    this.engine = deps.engine ?? defaultCalendar;
    this.clock = deps.clock ?? (() => new Date());
  }

  convertJalaliToGregorian(date: string): string {
    return formatDateText(this.engine.toGregorian(this.parseJalali(date)));
  }

  convertGregorianToJalali(date: string): string {
    return formatDateText(this.engine.toJalali(this.parseGregorian(date)));
  }

  diffDays(start: string, end: string): number {
    return diffDays(this.engine, this.parseJalali(start), this.parseJalali(end));
  }

  diffDaysWithAdjustment(start: string, end: string, adjustment: number): number {
    return diffDaysWithAdjustment(this.engine, this.parseJalali(start), this.parseJalali(end), adjustment);
  }

  addDays(date: string, days: number): string {
    return formatDateText(addDays(this.engine, this.parseJalali(date), days, date));
  }

  addMonths(date: string, months: number): string {
    return formatDateText(addMonths(this.engine, this.parseJalali(date), months, date));
  }

  /** Today's UTC calendar day in the Jalali calendar. Clocks past 9999-12-31 raise `OverflowError`. */
  now(): string {
    const current = this.clock();
    const today = this.engine.createDate(
      "gregorian",
      current.getUTCFullYear(),
      current.getUTCMonth() + 1,
      current.getUTCDate()
    );

    return formatDateText(this.engine.toJalali(today));
  }

  isLeapYear(date: string): boolean {
    return this.engine.isLeapYear(this.parseJalali(date));
  }

  periodState(date: string, anchorDay: number): PeriodState {
    return classifyPeriod(this.engine, this.parseJalali(date), anchorDay);
  }

  parseJalali(date: string): CalendarDate {
    const { year, month, day } = parseDateText(date, JALALI_DELIMITER);
    return this.engine.createDate("jalali", year, month, day, date);
  }

  parseGregorian(date: string): CalendarDate {
    const { year, month, day } = parseDateText(date, GREGORIAN_DELIMITER);
    return this.engine.createDate("gregorian", year, month, day, date);
  }
}
