import { formatDateText } from "../lib/format.js";
import { InvalidArgumentError, requireWholeNumber } from "../lib/errors.js";
import { monthLength } from "../lib/monthLength.js";
import type { CalendarDate } from "../types.js";
import type { CalendarEngine } from "./calendar.js";

export function addDays(engine: CalendarEngine, date: CalendarDate, delta: number, input?: string): CalendarDate {
  requireWholeNumber(delta, "days");

  return engine.fromDayCount(engine.toDayCount(date) + delta, date.calendar, input ?? formatDateText(date));
}

/** Positive when `end` falls after `start`. Dates may come from either calendar. */
export function diffDays(engine: CalendarEngine, start: CalendarDate, end: CalendarDate): number {
  return engine.toDayCount(end) - engine.toDayCount(start);
}

/**
 * Adds `adjustment` to the absolute difference and only then restores the
 * sign, so an adjustment of 1 turns the exclusive count into an inclusive
 * one in either direction.
 */
export function diffDaysWithAdjustment(
  engine: CalendarEngine,
  start: CalendarDate,
  end: CalendarDate,
  adjustment: number
): number {
  requireWholeNumber(adjustment, "adjustment");

  const diff = diffDays(engine, start, end);
  const sign = diff < 0 ? -1 : 1;
  const value = (Math.abs(diff) + adjustment) * sign;

  return value === 0 ? 0 : value;
}

export function addMonths(engine: CalendarEngine, date: CalendarDate, months: number, input?: string): CalendarDate {
  if (date.calendar !== "jalali") {
    throw new InvalidArgumentError(formatDateText(date), "months can only be added to a jalali date");
  }

  if (!Number.isInteger(months) || months <= 0) {
    throw new InvalidArgumentError(String(months), "months must be a positive integer");
  }
  requireWholeNumber(months, "months");

  let year = date.year + Math.floor(months / 12);
  let month = date.month + (months % 12);
  if (month > 12) {
    year += 1;
    month -= 12;
  }

  // clamp against the destination year, which may differ in leap status
  const lastDay = monthLength("jalali", month, engine.leapRule.isLeapYear(year));
  const day = Math.min(date.day, lastDay);

  return engine.createDate("jalali", year, month, day, input ?? formatDateText(date));
}
