export type FixtureErrorCode =
  | "INVALID_SCHEMA"
  | "INVALID_RECORD"
  | "NOT_A_SEQUENCE"
  | "ENCODE_FAILED"
  | "INVALID_STATUS"
  | "INVALID_REQUEST_BODY"
  | "MISSING_ATTRIBUTE";

export interface FixtureErrorInfo {
  code: FixtureErrorCode;
  message: string;
  field?: string;
  details?: unknown;
}
