import type { Optional } from "../types/schema.js";

const ABSENT: Optional<never> = { present: false };

export function present<T>(value: T): Optional<T> {
  return { present: true, value };
}

export function absent<T>(): Optional<T> {
  return ABSENT;
}

/** `undefined` and `null` both mean "unset". */
export function fromNullable<T>(value: T | null | undefined): Optional<T> {
  return value === undefined || value === null ? ABSENT : present(value);
}

export function isObjectRecord(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
