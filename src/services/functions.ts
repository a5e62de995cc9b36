import { z } from "zod";
import { InvalidArgumentError } from "../lib/errors.js";
import type { SqlValue } from "../types.js";
import type { DateOperations } from "./operations.js";

export type ParamKind = "text" | "integer";

export interface SqlParam {
  name: string;
  kind: ParamKind;
}

export interface SqlFunctionDefinition {
  name: string;
  params: readonly SqlParam[];
  deterministic: boolean;
  run(ops: DateOperations, args: SqlArguments): string | number;
}

const textSchema = z.string();
const integerSchema = z.union([z.number().int(), z.bigint()]).transform((value) => Number(value));

export class SqlArguments {
  constructor(
    private readonly definition: SqlFunctionDefinition,
    private readonly values: readonly SqlValue[]
  ) {}

  text(index: number): string {
    const parsed = textSchema.safeParse(this.values[index]);
    if (!parsed.success) {
      throw this.invalid(index, "text");
    }
    return parsed.data;
  }

  integer(index: number): number {
    const parsed = integerSchema.safeParse(this.values[index]);
    if (!parsed.success) {
      throw this.invalid(index, "an integer");
    }
    return parsed.data;
  }

  private invalid(index: number, expected: string): InvalidArgumentError {
    const param = this.definition.params[index]?.name ?? `#${index + 1}`;
    return new InvalidArgumentError(
      String(this.values[index]),
      `${this.definition.name} expects ${param} to be ${expected}`
    );
  }
}

const text = (name: string): SqlParam => ({ name, kind: "text" });
const integer = (name: string): SqlParam => ({ name, kind: "integer" });

export const SQL_FUNCTIONS: readonly SqlFunctionDefinition[] = [
  {
    name: "jalali_date_to_gregorian",
    params: [text("date")],
    deterministic: true,
    run: (ops, args) => ops.convertJalaliToGregorian(args.text(0))
  },
  {
    name: "gregorian_date_to_jalali",
    params: [text("date")],
    deterministic: true,
    run: (ops, args) => ops.convertGregorianToJalali(args.text(0))
  },
  {
    name: "jalali_date_diff",
    params: [text("date_start"), text("date_end")],
    deterministic: true,
    run: (ops, args) => ops.diffDays(args.text(0), args.text(1))
  },
  {
    name: "jalali_date_diff_with_addition",
    params: [text("date_start"), text("date_end"), integer("addition")],
    deterministic: true,
    run: (ops, args) => ops.diffDaysWithAdjustment(args.text(0), args.text(1), args.integer(2))
  },
  {
    name: "jalali_date_add_days",
    params: [text("date"), integer("days")],
    deterministic: true,
    run: (ops, args) => ops.addDays(args.text(0), args.integer(1))
  },
  {
    name: "jalali_date_add_months",
    params: [text("date"), integer("months")],
    deterministic: true,
    run: (ops, args) => ops.addMonths(args.text(0), args.integer(1))
  },
  {
    name: "jalali_date_now",
    params: [],
    deterministic: false,
    run: (ops) => ops.now()
  },
  {
    name: "jalali_date_is_leap_year",
    params: [text("date")],
    deterministic: true,
    run: (ops, args) => (ops.isLeapYear(args.text(0)) ? 1 : 0)
  },
  {
    name: "jalali_date_period_state",
    params: [text("date"), integer("start")],
    deterministic: true,
    run: (ops, args) => ops.periodState(args.text(0), args.integer(1))
  }
];

export function findSqlFunction(name: string): SqlFunctionDefinition | undefined {
  return SQL_FUNCTIONS.find((definition) => definition.name === name);
}

/**
 * Runs one SQL call. NULL in any argument gives NULL back without touching
 * the date functions.
 */
export function invokeSqlFunction(
  ops: DateOperations,
  definition: SqlFunctionDefinition,
  values: readonly SqlValue[]
): string | number | null {
  if (values.length !== definition.params.length) {
    throw new InvalidArgumentError(
      definition.name,
      `expects ${definition.params.length} argument(s), got ${values.length}`
    );
  }

  if (values.some((value) => value === null)) {
    return null;
  }

  return definition.run(ops, new SqlArguments(definition, values));
}
