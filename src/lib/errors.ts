export type DateErrorCode = "FormatError" | "InvalidDateError" | "InvalidArgumentError" | "OverflowError";

export abstract class DateError extends Error {
  abstract readonly code: DateErrorCode;

  constructor(
    public readonly input: string,
    message: string
  ) {
    super(message);
  }
}

export class FormatError extends DateError {
  readonly code = "FormatError";

  constructor(input: string, cause: string) {
    super(input, `invalid date ${input} ${cause}`);
    this.name = "FormatError";
  }
}

export class InvalidDateError extends DateError {
  readonly code = "InvalidDateError";

  constructor(input: string, cause: string) {
    super(input, `invalid date ${input} ${cause}`);
    this.name = "InvalidDateError";
  }
}

export class InvalidArgumentError extends DateError {
  readonly code = "InvalidArgumentError";

  constructor(input: string, cause: string) {
    super(input, `invalid argument ${input}: ${cause}`);
    this.name = "InvalidArgumentError";
  }
}

export class OverflowError extends DateError {
  readonly code = "OverflowError";

  constructor(input: string, cause: string) {
    super(input, `date ${input} out of range: ${cause}`);
    this.name = "OverflowError";
  }
}

export function isDateError(error: unknown): error is DateError {
  return error instanceof DateError;
}

/**
 * Fractions are argument errors; whole numbers past 2^53 cannot be counted
 * in exactly and are reported as overflow.
 */
export function requireWholeNumber(value: number, label: string): number {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(String(value), `${label} must be an integer`);
  }
  if (!Number.isSafeInteger(value)) {
    throw new OverflowError(String(value), `${label} too large to represent exactly`);
  }
  return value;
}
