import { describe, expect, it } from "vitest";
import { InvalidDateError, OverflowError } from "../src/lib/errors.js";
import { breaksLeapRule } from "../src/lib/leapYear.js";
import type { LeapYearRule } from "../src/lib/leapYear.js";
import { dayCountToGregorian, gregorianToDayCount } from "../src/lib/dayCount.js";
import { CalendarEngine, JALALI_MAX_YEAR } from "../src/services/calendar.js";

const engine = new CalendarEngine();

const jalali = (year: number, month: number, day: number) => engine.createDate("jalali", year, month, day);
const gregorian = (year: number, month: number, day: number) => engine.createDate("gregorian", year, month, day);

describe("day counts", () => {
  it("numbers gregorian days from 0001-01-01", () => {
    expect(gregorianToDayCount(1, 1, 1)).toBe(1);
    expect(gregorianToDayCount(2024, 3, 20)).toBe(738965);
    expect(dayCountToGregorian(738965)).toEqual({ year: 2024, month: 3, day: 20 });
  });

  it("handles the last day of a leap year", () => {
    const dayCount = gregorianToDayCount(2000, 12, 31);
    expect(dayCountToGregorian(dayCount)).toEqual({ year: 2000, month: 12, day: 31 });
    expect(dayCountToGregorian(dayCount + 1)).toEqual({ year: 2001, month: 1, day: 1 });
  });
});

describe("CalendarEngine.createDate", () => {
  it("returns frozen dates", () => {
    const date = jalali(1403, 12, 30);
    expect(date).toEqual({ year: 1403, month: 12, day: 30, calendar: "jalali" });
    expect(Object.isFrozen(date)).toBe(true);
  });

  it.each([
    [1404, 12, 30],
    [1403, 13, 1],
    [1403, 0, 1],
    [1403, 7, 31],
    [1403, 1, 0],
    [1403, 1, 32]
  ])("rejects jalali %i/%i/%i", (year, month, day) => {
    expect(() => jalali(year, month, day)).toThrow(InvalidDateError);
  });

  it("rejects gregorian days that do not exist", () => {
    expect(() => gregorian(2023, 2, 29)).toThrow(InvalidDateError);
    expect(() => gregorian(2024, 4, 31)).toThrow(InvalidDateError);
    expect(gregorian(2024, 2, 29).day).toBe(29);
  });

  it("names the date in the failure", () => {
    expect(() => jalali(1404, 12, 30)).toThrow("invalid date 1404/12/30 jalali date");
  });

  it("accepts jalali years before 1 that still fall after 0001-01-01", () => {
    expect(jalali(0, 6, 1).year).toBe(0);
    expect(jalali(-621, 10, 11).year).toBe(-621);
  });

  it("rejects dates outside 0001-01-01..9999-12-31", () => {
    expect(() => jalali(-621, 10, 10)).toThrow(OverflowError);
    expect(() => jalali(9378, 10, 11)).toThrow(OverflowError);
    expect(() => jalali(JALALI_MAX_YEAR + 1, 1, 1)).toThrow(OverflowError);
    expect(() => gregorian(0, 12, 31)).toThrow(OverflowError);
    expect(() => gregorian(10000, 1, 1)).toThrow(OverflowError);
    expect(() => jalali(-621, 10, 10)).toThrow("date -0621/10/10 out of range: outside 0001-01-01..9999-12-31");
  });
});

describe("CalendarEngine conversion", () => {
  it("maps nowruz to the march equinox", () => {
    expect(engine.toGregorian(jalali(1402, 1, 1))).toEqual(gregorian(2023, 3, 21));
    expect(engine.toGregorian(jalali(1403, 1, 1))).toEqual(gregorian(2024, 3, 20));
    expect(engine.toGregorian(jalali(1404, 1, 1))).toEqual(gregorian(2025, 3, 21));
  });

  it("converts leap days both ways", () => {
    expect(engine.toGregorian(jalali(1399, 12, 30))).toEqual(gregorian(2021, 3, 20));
    expect(engine.toJalali(gregorian(2025, 3, 20))).toEqual(jalali(1403, 12, 30));
    expect(engine.toJalali(gregorian(2024, 2, 29))).toEqual(jalali(1402, 12, 10));
  });

  it("covers every four-digit gregorian year", () => {
    expect(engine.toGregorian(jalali(1, 1, 1))).toEqual(gregorian(622, 3, 21));
    expect(engine.toJalali(gregorian(1, 1, 1))).toEqual(jalali(-621, 10, 11));
    expect(engine.toJalali(gregorian(9999, 12, 31))).toEqual(jalali(9378, 10, 10));
    expect(engine.fromDayCount(engine.minDayCount, "jalali")).toEqual(jalali(-621, 10, 11));
    expect(() => engine.fromDayCount(engine.minDayCount - 1, "jalali")).toThrow(OverflowError);
    expect(() => engine.fromDayCount(engine.maxDayCount + 1, "gregorian")).toThrow(OverflowError);
  });

  it("round-trips the first and last days of the range", () => {
    for (const dayCount of [engine.minDayCount, engine.minDayCount + 400, engine.maxDayCount - 400, engine.maxDayCount]) {
      const date = engine.fromDayCount(dayCount, "jalali");
      expect(engine.toDayCount(engine.toGregorian(date))).toBe(dayCount);
      expect(engine.toJalali(engine.toGregorian(date))).toEqual(date);
    }
  });

  it("leaves dates already in the target calendar alone", () => {
    const date = jalali(1403, 5, 29);
    expect(engine.toJalali(date)).toBe(date);
  });

  it("round-trips every day of several years", () => {
    const start = engine.toDayCount(jalali(1398, 1, 1));
    for (let dayCount = start; dayCount < start + 365 * 8; dayCount += 1) {
      const date = engine.fromDayCount(dayCount, "jalali");
      const back = engine.toJalali(engine.toGregorian(date));
      expect(back).toEqual(date);
      expect(engine.toDayCount(back)).toBe(dayCount);
    }
  });

  it("round-trips gregorian dates across century boundaries", () => {
    for (const [year, month, day] of [
      [1700, 2, 28],
      [1800, 3, 1],
      [1900, 12, 31],
      [2000, 2, 29],
      [2100, 3, 1],
      [600, 1, 1],
      [9999, 12, 31]
    ] as const) {
      const date = gregorian(year, month, day);
      expect(engine.toGregorian(engine.toJalali(date))).toEqual(date);
    }
  });

  it("agrees with the leap rule on the length of every year", () => {
    for (let year = 1300; year <= 1500; year += 1) {
      const leap = engine.isLeapYear(jalali(year, 1, 1));
      const buildsDay30 = (() => {
        try {
          jalali(year, 12, 30);
          return true;
        } catch {
          return false;
        }
      })();
      expect(buildsDay30).toBe(leap);
      expect(engine.toDayCount(jalali(year + 1, 1, 1)) - engine.toDayCount(jalali(year, 1, 1))).toBe(
        leap ? 366 : 365
      );
    }
  });
});

describe("CalendarEngine with another leap rule", () => {
  it("keeps 1403/01/01 on 2024-03-20 under the break-year rule", () => {
    const breaks = new CalendarEngine(breaksLeapRule);
    const date = breaks.createDate("jalali", 1403, 12, 30);
    expect(breaks.toGregorian(date)).toEqual(breaks.createDate("gregorian", 2025, 3, 20));
  });

  it("derives year lengths from an injected rule", () => {
    const alwaysLeap: LeapYearRule = { isLeapYear: () => true };
    const custom = new CalendarEngine(alwaysLeap);

    expect(custom.createDate("jalali", 1404, 12, 30).day).toBe(30);
    expect(custom.toGregorian(custom.createDate("jalali", 1405, 1, 1))).toEqual(
      custom.createDate("gregorian", 2026, 3, 22)
    );
    expect(engine.toGregorian(jalali(1405, 1, 1))).toEqual(gregorian(2026, 3, 21));
  });
});
