import type { LeapRuleName } from "../types.js";

export interface LeapYearRule {
  isLeapYear(year: number): boolean;
}

const mod = (a: number, b: number): number => ((a % b) + b) % b;

/**
 * Fixed 33-year arithmetic cycle: eight leap years per cycle, at positions
 * 1, 5, 9, 13, 17, 22, 26 and 30.
 */
export const cycle33LeapRule: LeapYearRule = {
  isLeapYear(year) {
    return mod(25 * year + 11, 33) < 8;
  }
};

// Years in which the leap pattern restarts, from Borkowski's algorithm.
const BREAKS = [
  -61, 9, 38, 199, 426, 686, 756, 818, 1111, 1181, 1210, 1635, 2060, 2097, 2192, 2262, 2324, 2394, 2456, 3178
];

const FIRST_BREAK = BREAKS[0] ?? -61;
const LAST_BREAK = BREAKS[BREAKS.length - 1] ?? 3178;

// Truncating division and remainder, as the break-year formulas expect.
const tdiv = (a: number, b: number): number => Math.trunc(a / b);
const tmod = (a: number, b: number): number => a - tdiv(a, b) * b;

/**
 * Borkowski's break-year rule. It tracks the astronomical equinox more
 * closely than the plain cycle but is only defined from -61 up to 3177;
 * beyond that span it defers to the 33-year cycle.
 */
export const breaksLeapRule: LeapYearRule = {
  isLeapYear(year) {
    if (year < FIRST_BREAK || year >= LAST_BREAK) {
      return cycle33LeapRule.isLeapYear(year);
    }

    let previousBreak = FIRST_BREAK;
    let jump = 0;
    for (const nextBreak of BREAKS.slice(1)) {
      jump = nextBreak - previousBreak;
      if (year < nextBreak) {
        break;
      }
      previousBreak = nextBreak;
    }

    let n = year - previousBreak;
    if (jump - n < 6) {
      n = n - jump + tdiv(jump + 4, 33) * 33;
    }

    let sinceLeap = tmod(tmod(n + 1, 33) - 1, 4);
    if (sinceLeap === -1) {
      sinceLeap = 4;
    }

    return sinceLeap === 0;
  }
};

export function leapRuleByName(name: LeapRuleName): LeapYearRule {
  switch (name) {
    case "cycle33":
      return cycle33LeapRule;
    case "breaks":
      return breaksLeapRule;
  }
}
