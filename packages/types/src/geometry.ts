/**
 * Shapes shared by vectors, points and directions.
 *
 * A geometric value is a readonly tuple of numbers intersected with three
 * phantom slots: its kind, its tag, and its arity. The tag and arity slots
 * are function-typed so they are invariant: a `Vector<Meters, 3>` is not a
 * `Vector<Meters | Feet, 3>` and not a `Vector<Meters, 2 | 3>`. None of the
 * slots exist at runtime, where every value is a plain `number[]`.
 */

import type { Tag } from "./tags.js";

declare const kindSlot: unique symbol;
declare const tagSlot: unique symbol;
declare const aritySlot: unique symbol;

export type Arity = 2 | 3 | 4;
export type PointArity = 2 | 3;

export interface Components {
  2: readonly [number, number];
  3: readonly [number, number, number];
  4: readonly [number, number, number, number];
}

export type GeometryKind = "vector" | "point" | "direction";

export type Shaped<K extends GeometryKind, T extends Tag, N extends Arity> = Components[N] & {
  readonly [kindSlot]: K;
  readonly [tagSlot]: (tag: T) => T;
  readonly [aritySlot]: (arity: N) => N;
};

/** A displacement: has a magnitude in T's units (or lives in T's space) */
export type Vector<T extends Tag, N extends Arity> = Shaped<"vector", T, N>;

/** A position. Points subtract to vectors and never add to each other. */
export type Point<T extends Tag, N extends PointArity> = Shaped<"point", T, N>;

/** A unit-length heading. Carries T as provenance but no magnitude. */
export type Direction<T extends Tag, N extends Arity> = Shaped<"direction", T, N>;

// ============================================================================
// Branding (the only place phantom slots are attached)
// ============================================================================

export function asVector<T extends Tag, N extends Arity>(c: readonly number[]): Vector<T, N> {
  return c as Vector<T, N>;
}

export function asPoint<T extends Tag, N extends PointArity>(c: readonly number[]): Point<T, N> {
  return c as Point<T, N>;
}

export function asDirection<T extends Tag, N extends Arity>(c: readonly number[]): Direction<T, N> {
  return c as Direction<T, N>;
}

// ============================================================================
// Component helpers
// ============================================================================

export function mapComponents(a: readonly number[], f: (c: number, i: number) => number): number[] {
  return a.map(f);
}

export function zipComponents(
  a: readonly number[],
  b: readonly number[],
  f: (x: number, y: number) => number
): number[] {
  return a.map((c, i) => f(c, b[i]));
}

export function dotComponents(a: readonly number[], b: readonly number[]): number {
  return a.reduce((sum, c, i) => sum + c * b[i], 0);
}

/** Euclidean length, without overflow or underflow in the squares */
export function normComponents(a: readonly number[]): number {
  return Math.hypot(...a);
}

export function approxEqualComponents(
  a: readonly number[],
  b: readonly number[],
  tolerance: number
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i] && !(Math.abs(a[i] - b[i]) <= tolerance)) return false;
  }
  return true;
}
