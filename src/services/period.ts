import { requireWholeNumber } from "../lib/errors.js";
import { monthLength } from "../lib/monthLength.js";
import type { CalendarDate, PeriodState } from "../types.js";
import type { CalendarEngine } from "./calendar.js";

export interface PeriodContext {
  date: CalendarDate;
  anchorDay: number;
  monthEnd: boolean;
  /** Day-of-month of the day before `date`, only read for the first of Farvardin. */
  previousDay: () => number;
}

export interface PeriodRule {
  name: string;
  matches(context: PeriodContext): boolean;
  state: PeriodState;
}

const anchorInMonth = (anchorDay: number) => anchorDay >= 1 && anchorDay <= 31;

/**
 * Evaluated top to bottom; the first matching row decides. A short month
 * that ends before the anchor day still closes its period, and the first of
 * a month opens one when the anchor lies past the previous month's end.
 */
export const PERIOD_RULES: readonly PeriodRule[] = [
  {
    name: "month end before anchor",
    matches: ({ date, anchorDay, monthEnd }) => monthEnd && date.day <= anchorDay,
    state: "End"
  },
  {
    name: "first of year after year end",
    matches: ({ date, anchorDay, previousDay }) =>
      date.day === 1 && date.month === 1 && (anchorDay >= 30 || anchorDay === previousDay()),
    state: "Start"
  },
  {
    name: "first of month after short month",
    matches: ({ date, anchorDay }) =>
      date.day === 1 &&
      ((date.month >= 2 && date.month <= 7 && anchorDay === 31) ||
        (date.month >= 8 && date.month <= 12 && anchorDay >= 30)),
    state: "Start"
  },
  {
    name: "anchor day",
    matches: ({ date, anchorDay }) => anchorInMonth(anchorDay) && date.day === anchorDay,
    state: "End"
  },
  {
    name: "day after anchor",
    matches: ({ date, anchorDay }) => anchorInMonth(anchorDay) && date.day === anchorDay + 1,
    state: "Start"
  },
  {
    name: "inside period",
    matches: ({ anchorDay }) => anchorInMonth(anchorDay),
    state: "Middle"
  }
];

export function classifyPeriod(
  engine: CalendarEngine,
  date: CalendarDate,
  anchorDay: number,
  rules: readonly PeriodRule[] = PERIOD_RULES
): PeriodState {
  requireWholeNumber(anchorDay, "anchor day");

  const jalali = engine.toJalali(date);
  const leapYear = engine.leapRule.isLeapYear(jalali.year);
  const context: PeriodContext = {
    date: jalali,
    anchorDay,
    monthEnd: jalali.day === monthLength("jalali", jalali.month, leapYear),
    previousDay: () => previousDayOfMonth(engine, jalali)
  };

  const rule = rules.find((candidate) => candidate.matches(context));
  return rule?.state ?? "Unknown";
}

function previousDayOfMonth(engine: CalendarEngine, date: CalendarDate): number {
  if (date.day > 1) {
    return date.day - 1;
  }

  if (date.month > 1) {
    return monthLength("jalali", date.month - 1, engine.leapRule.isLeapYear(date.year));
  }

  return monthLength("jalali", 12, engine.leapRule.isLeapYear(date.year - 1));
}
