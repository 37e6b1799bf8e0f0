/**
 * Points
 *
 * A point is a position, not a displacement. Points subtract to vectors,
 * move by vectors, and never add to one another:
 *
 *   point - point  = vector
 *   point + vector = point
 *   point + point  (not expressible)
 *
 * Converting a point between units applies the unit offset as well as the
 * scale; converting a vector applies only the scale.
 */

import type { Angle } from "./angle.js";
import {
  approxEqualComponents,
  asPoint,
  asVector,
  dotComponents,
  normComponents,
  zipComponents,
  type Point,
  type PointArity,
  type Vector,
} from "./geometry.js";
import { quantity, type Quantity } from "./quantity.js";
import { getSettings } from "./settings.js";
import type { SameFamily, Tag } from "./tags.js";
import { convertValue, type Radians, type UnitDef, type Unitless } from "./units.js";

export type Point2<T extends Tag = Unitless> = Point<T, 2>;
export type Point3<T extends Tag = Unitless> = Point<T, 3>;

// ============================================================================
// Constructors
// ============================================================================

export function point2<T extends Tag = Unitless>(x: number, y: number): Point2<T> {
  return asPoint<T, 2>([x, y]);
}

export function point3<T extends Tag = Unitless>(x: number, y: number, z: number): Point3<T> {
  return asPoint<T, 3>([x, y, z]);
}

export function origin<T extends Tag, N extends PointArity>(arity: N): Point<T, N> {
  return asPoint<T, N>(new Array<number>(arity).fill(0));
}

// ============================================================================
// Accessors
// ============================================================================

export function px<T extends Tag, N extends PointArity>(p: Point<T, N>): Quantity<T> {
  const c: readonly number[] = p;
  return quantity<T>(c[0]);
}

export function py<T extends Tag, N extends PointArity>(p: Point<T, N>): Quantity<T> {
  const c: readonly number[] = p;
  return quantity<T>(c[1]);
}

export function pz<T extends Tag>(p: Point3<T>): Quantity<T> {
  return quantity<T>(p[2]);
}

/** A mutable copy of the coordinates */
export function pointToArray<T extends Tag, N extends PointArity>(p: Point<T, N>): number[] {
  const c: readonly number[] = p;
  return [...c];
}

// ============================================================================
// Affine Operations
// ============================================================================

/** The vector from `from` to `to` */
export function displacement<T extends Tag, N extends PointArity>(
  from: Point<T, N>,
  to: Point<T, N>
): Vector<T, N> {
  return asVector<T, N>(zipComponents(to, from, (a, b) => a - b));
}

/** Move a point by a vector */
export function translate<T extends Tag, N extends PointArity>(p: Point<T, N>, v: Vector<T, N>): Point<T, N> {
  return asPoint<T, N>(zipComponents(p, v, (a, b) => a + b));
}

/** Move a point against a vector */
export function retreat<T extends Tag, N extends PointArity>(p: Point<T, N>, v: Vector<T, N>): Point<T, N> {
  return asPoint<T, N>(zipComponents(p, v, (a, b) => a - b));
}

export function distance<T extends Tag, N extends PointArity>(a: Point<T, N>, b: Point<T, N>): Quantity<T> {
  return quantity<T>(normComponents(zipComponents(a, b, (p, q) => p - q)));
}

export function distanceSquared<T extends Tag, N extends PointArity>(a: Point<T, N>, b: Point<T, N>): number {
  const d = zipComponents(a, b, (p, q) => p - q);
  return dotComponents(d, d);
}

export function midpoint<T extends Tag, N extends PointArity>(a: Point<T, N>, b: Point<T, N>): Point<T, N> {
  return lerpPoint(a, b, 0.5);
}

export function lerpPoint<T extends Tag, N extends PointArity>(
  a: Point<T, N>,
  b: Point<T, N>,
  t: number
): Point<T, N> {
  return asPoint<T, N>(zipComponents(a, b, (p, q) => p + (q - p) * t));
}

/** Rotate counter-clockwise about a pivot */
export function rotateAround<T extends Tag>(
  p: Point2<T>,
  pivot: Point2<T>,
  angle: Angle<Radians>
): Point2<T> {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const dx = p[0] - pivot[0];
  const dy = p[1] - pivot[1];
  return point2<T>(pivot[0] + dx * c - dy * s, pivot[1] + dx * s + dy * c);
}

// ============================================================================
// Comparison and Conversion
// ============================================================================

export function approxEqualsPoint<T extends Tag, N extends PointArity>(
  a: Point<T, N>,
  b: Point<T, N>,
  tolerance: number = getSettings().tolerance
): boolean {
  return approxEqualComponents(a, b, tolerance);
}

/**
 * Re-express a point in another unit of the same family. Each coordinate
 * is an absolute value, so unit offsets apply.
 */
export function convertPoint<A extends Tag, B extends SameFamily<A>, N extends PointArity>(
  p: Point<A, N>,
  from: UnitDef<A>,
  to: UnitDef<B>
): Point<B, N> {
  const c: readonly number[] = p;
  return asPoint<B, N>(c.map((v) => convertValue(v, from, to)));
}
