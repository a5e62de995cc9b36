export type CalendarKind = "jalali" | "gregorian";

export type PeriodState = "Start" | "End" | "Middle" | "Unknown";

export type LeapRuleName = "cycle33" | "breaks";

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly calendar: CalendarKind;
}

export interface RawDateFields {
  year: number;
  month: number;
  day: number;
}

export type SqlValue = string | number | bigint | Buffer | null;
