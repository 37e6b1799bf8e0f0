/**
 * Typeclass instances for quantities and vectors.
 *
 * Instances are plain dictionaries, so generic code (sorting, deduplication,
 * reductions, printing) can work over tagged values without knowing their
 * tag. Tolerance-based instances read the configured default tolerance each
 * time they compare unless one is fixed when the instance is made.
 */

import { type Arity, type Point, type PointArity, type Vector, approxEqualComponents } from "./geometry.js";
import { compare, type Quantity } from "./quantity.js";
import { getSettings } from "./settings.js";
import type { Tag } from "./tags.js";
import { formatQuantity, type UnitDef } from "./units.js";
import { addVec, negate, subVec, zero } from "./vector.js";

// ============================================================================
// Interfaces
// ============================================================================

export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export type Ordering = -1 | 0 | 1;

export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

export interface Show<A> {
  show(a: A): string;
}

/** Addition with an identity and inverses */
export interface AdditiveGroup<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  negate(a: A): A;
  zero(): A;
}

export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

export function makeOrd<A>(cmp: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => cmp(a, b) === 0,
    notEquals: (a, b) => cmp(a, b) !== 0,
    compare: cmp,
    lessThan: (a, b) => cmp(a, b) === -1,
    lessThanOrEqual: (a, b) => cmp(a, b) !== 1,
    greaterThan: (a, b) => cmp(a, b) === 1,
    greaterThanOrEqual: (a, b) => cmp(a, b) !== -1,
  };
}

// ============================================================================
// Quantity Instances
// ============================================================================

/** Equality within `tolerance`, or the configured default */
export function eqQuantity<T extends Tag>(tolerance?: number): Eq<Quantity<T>> {
  return makeEq<Quantity<T>>((a, b) => a === b || Math.abs(a - b) <= (tolerance ?? getSettings().tolerance));
}

export function ordQuantity<T extends Tag>(): Ord<Quantity<T>> {
  return makeOrd<Quantity<T>>(compare);
}

export function showQuantity<T extends Tag>(unit: UnitDef<T>): Show<Quantity<T>> {
  return { show: (q) => formatQuantity(q, unit) };
}

// ============================================================================
// Vector and Point Instances
// ============================================================================

export function eqVector<T extends Tag, N extends Arity>(tolerance?: number): Eq<Vector<T, N>> {
  return makeEq<Vector<T, N>>((a, b) => approxEqualComponents(a, b, tolerance ?? getSettings().tolerance));
}

export function eqPoint<T extends Tag, N extends PointArity>(tolerance?: number): Eq<Point<T, N>> {
  return makeEq<Point<T, N>>((a, b) => approxEqualComponents(a, b, tolerance ?? getSettings().tolerance));
}

/** `Vector3(1, 2, 3)` */
export function showVector<T extends Tag, N extends Arity>(): Show<Vector<T, N>> {
  return { show: (v) => showComponents("Vector", v) };
}

/** `Point2(5, 6)` */
export function showPoint<T extends Tag, N extends PointArity>(): Show<Point<T, N>> {
  return { show: (p) => showComponents("Point", p) };
}

function showComponents(kind: string, c: readonly number[]): string {
  return `${kind}${c.length}(${c.join(", ")})`;
}

export function additiveVector<T extends Tag, N extends Arity>(arity: N): AdditiveGroup<Vector<T, N>> {
  return {
    add: addVec,
    sub: subVec,
    negate,
    zero: () => zero<T, N>(arity),
  };
}
