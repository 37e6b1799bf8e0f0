/**
 * Quantity - a number paired with a dimension tag
 *
 * At runtime a `Quantity<T>` is just a number. The tag lives in a phantom
 * slot typed as `(tag: T) => T`, which makes the slot invariant: a
 * `Quantity<Meters>` is neither a `Quantity<Feet>` nor a
 * `Quantity<Meters | Feet>`, and a bare number is not a quantity at all.
 *
 * Arithmetic between quantities goes through the functions below. The
 * built-in operators still work on the underlying numbers but yield an
 * untagged `number`, which cannot flow back into a quantity slot without
 * an explicit `quantity<T>(...)`.
 *
 * @example
 * ```typescript
 * const a = Meters.of(3);
 * const b = Meters.of(4);
 * const c = add(a, b);            // Quantity<Meters>
 * add(a, Feet.of(1));             // Compile error
 * const d = convert(c, Meters, Feet);
 * ```
 */

import { getSettings } from "./settings.js";
import type { Tag } from "./tags.js";

declare const quantityTag: unique symbol;

export type Quantity<T extends Tag> = number & {
  readonly [quantityTag]: (tag: T) => T;
};

// ============================================================================
// Construction
// ============================================================================

/** Tag a raw number. The tag is supplied as a type argument. */
export function quantity<T extends Tag>(value: number): Quantity<T> {
  return value as Quantity<T>;
}

/** The underlying number */
export function raw<T extends Tag>(q: Quantity<T>): number {
  return q;
}

// ============================================================================
// Arithmetic
// ============================================================================

export function add<T extends Tag>(a: Quantity<T>, b: Quantity<T>): Quantity<T> {
  return quantity<T>(a + b);
}

export function sub<T extends Tag>(a: Quantity<T>, b: Quantity<T>): Quantity<T> {
  return quantity<T>(a - b);
}

/** Multiply by a plain scalar */
export function mul<T extends Tag>(q: Quantity<T>, factor: number): Quantity<T> {
  return quantity<T>(q * factor);
}

/** Divide by a plain scalar */
export function div<T extends Tag>(q: Quantity<T>, divisor: number): Quantity<T> {
  return quantity<T>(q / divisor);
}

/** How many times `b` fits in `a`; the tags cancel */
export function ratio<T extends Tag>(a: Quantity<T>, b: Quantity<T>): number {
  return a / b;
}

export function neg<T extends Tag>(q: Quantity<T>): Quantity<T> {
  return quantity<T>(-q);
}

export function abs<T extends Tag>(q: Quantity<T>): Quantity<T> {
  return quantity<T>(Math.abs(q));
}

/** Sum of same-tag quantities; zero for an empty list */
export function sum<T extends Tag>(quantities: readonly Quantity<T>[]): Quantity<T> {
  let total = 0;
  for (const q of quantities) total += q;
  return quantity<T>(total);
}

// ============================================================================
// Comparison
// ============================================================================

/** -1, 0 or 1. NaN compares as 0 against everything. */
export function compare<T extends Tag>(a: Quantity<T>, b: Quantity<T>): -1 | 0 | 1 {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function equals<T extends Tag>(a: Quantity<T>, b: Quantity<T>): boolean {
  return a === b;
}

export function lessThan<T extends Tag>(a: Quantity<T>, b: Quantity<T>): boolean {
  return a < b;
}

export function lessThanOrEqual<T extends Tag>(a: Quantity<T>, b: Quantity<T>): boolean {
  return a <= b;
}

export function greaterThan<T extends Tag>(a: Quantity<T>, b: Quantity<T>): boolean {
  return a > b;
}

export function greaterThanOrEqual<T extends Tag>(a: Quantity<T>, b: Quantity<T>): boolean {
  return a >= b;
}

export function min<T extends Tag>(a: Quantity<T>, b: Quantity<T>): Quantity<T> {
  return a > b ? b : a;
}

export function max<T extends Tag>(a: Quantity<T>, b: Quantity<T>): Quantity<T> {
  return a < b ? b : a;
}

export function clamp<T extends Tag>(
  q: Quantity<T>,
  lo: Quantity<T>,
  hi: Quantity<T>
): Quantity<T> {
  if (q < lo) return lo;
  if (q > hi) return hi;
  return q;
}

/**
 * Equality within an absolute tolerance. Identical values (including equal
 * infinities) are always approximately equal; NaN never is.
 */
export function approxEquals<T extends Tag>(
  a: Quantity<T>,
  b: Quantity<T>,
  tolerance: number = getSettings().tolerance
): boolean {
  return a === b || Math.abs(a - b) <= tolerance;
}
