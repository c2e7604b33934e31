import type { FixtureErrorCode, FixtureErrorInfo } from "../types/result.js";

export function err(
  code: FixtureErrorCode,
  message: string,
  details?: unknown,
  field?: string,
): FixtureErrorInfo {
  return { code, message, details, field };
}

/**
 * Raised for caller-contract violations and encoding failures. These are
 * fatal: the surrounding test is expected to fail, not recover.
 */
export class FixtureError extends Error {
  readonly code: FixtureErrorCode;
  readonly field?: string;
  readonly details?: unknown;

  constructor(info: FixtureErrorInfo, options?: { cause?: unknown }) {
    super(info.message, options);
    this.name = "FixtureError";
    this.code = info.code;
    this.field = info.field;
    this.details = info.details;
  }

  toJSON(): FixtureErrorInfo {
    return {
      code: this.code,
      message: this.message,
      field: this.field,
      details: this.details,
    };
  }
}

export function fail(
  code: FixtureErrorCode,
  message: string,
  details?: unknown,
  field?: string,
): never {
  throw new FixtureError(err(code, message, details, field));
}

export function isFixtureError(
  e: unknown,
  code?: FixtureErrorCode,
): e is FixtureError {
  return e instanceof FixtureError && (code === undefined || e.code === code);
}
