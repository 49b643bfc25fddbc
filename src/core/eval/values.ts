// src/core/eval/values.ts
// Runtime values. The language has integers and strings only; `write` and
// `tell` return the empty string.

export type Val = number | string;

export const VEmpty: Val = "";

/**
 * Which values `if` treats as false.
 * - "zero-and-empty-false": 0 and "" are false (default)
 * - "empty-false": only "" is false
 */
export type Truthiness = "zero-and-empty-false" | "empty-false";

export function isTruthy(v: Val, truthiness: Truthiness = "zero-and-empty-false"): boolean {
  if (typeof v === "string") return v !== "";
  return truthiness === "empty-false" ? true : v !== 0;
}

/** Payload text handed to the driver by write/tell/ask. */
export function valueToString(v: Val): string {
  return typeof v === "number" ? String(v) : v;
}
