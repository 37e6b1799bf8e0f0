/**
 * Vectors
 *
 * A `Vector<T, N>` is a displacement with N components, tagged by a unit or
 * a coordinate space. Every binary operation requires both operands to carry
 * the same tag and arity; mixing them is a compile error, never a runtime
 * check. The one runtime check is normalization, which refuses a zero or
 * non-finite vector and reports it through `Either`.
 *
 * @example
 * ```typescript
 * const v = vec3<Meters>(3, 4, 0);
 * magnitude(v);                    // Quantity<Meters> 5
 * addVec(v, vec3<Feet>(1, 1, 1)); // Compile error
 * ```
 */

import { Either } from "effect";
import { atan2, type Angle } from "./angle.js";
import { DegenerateInputError } from "./errors.js";
import {
  approxEqualComponents,
  asDirection,
  asVector,
  dotComponents,
  mapComponents,
  normComponents,
  zipComponents,
  type Arity,
  type Direction,
  type Vector,
} from "./geometry.js";
import { quantity, type Quantity } from "./quantity.js";
import { getSettings } from "./settings.js";
import type { SameFamily, Tag } from "./tags.js";
import { convertDeltaValue, type Radians, type UnitDef, type Unitless } from "./units.js";

export type Vector2<T extends Tag = Unitless> = Vector<T, 2>;
export type Vector3<T extends Tag = Unitless> = Vector<T, 3>;
export type Vector4<T extends Tag = Unitless> = Vector<T, 4>;

// ============================================================================
// Constructors
// ============================================================================

export function vec2<T extends Tag = Unitless>(x: number, y: number): Vector2<T> {
  return asVector<T, 2>([x, y]);
}

export function vec3<T extends Tag = Unitless>(x: number, y: number, z: number): Vector3<T> {
  return asVector<T, 3>([x, y, z]);
}

export function vec4<T extends Tag = Unitless>(x: number, y: number, z: number, w: number): Vector4<T> {
  return asVector<T, 4>([x, y, z, w]);
}

/** Every component set to `value` */
export function splat<T extends Tag, N extends Arity>(value: number, arity: N): Vector<T, N> {
  return asVector<T, N>(new Array<number>(arity).fill(value));
}

export function zero<T extends Tag, N extends Arity>(arity: N): Vector<T, N> {
  return splat<T, N>(0, arity);
}

// ============================================================================
// Accessors
// ============================================================================

export function x<T extends Tag, N extends Arity>(v: Vector<T, N>): Quantity<T> {
  const c: readonly number[] = v;
  return quantity<T>(c[0]);
}

export function y<T extends Tag, N extends Arity>(v: Vector<T, N>): Quantity<T> {
  const c: readonly number[] = v;
  return quantity<T>(c[1]);
}

export function z<T extends Tag>(v: Vector3<T> | Vector4<T>): Quantity<T> {
  return quantity<T>(v[2]);
}

export function w<T extends Tag>(v: Vector4<T>): Quantity<T> {
  return quantity<T>(v[3]);
}

/**
 * Component by index.
 * @throws RangeError if the index is outside the vector
 */
export function component<T extends Tag, N extends Arity>(v: Vector<T, N>, index: number): Quantity<T> {
  const c: readonly number[] = v;
  if (!Number.isInteger(index) || index < 0 || index >= c.length) {
    throw new RangeError(`component index ${index} out of range for Vector${c.length}`);
  }
  return quantity<T>(c[index]);
}

/** A mutable copy of the components */
export function toArray<T extends Tag, N extends Arity>(v: Vector<T, N>): number[] {
  const c: readonly number[] = v;
  return [...c];
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addVec<T extends Tag, N extends Arity>(a: Vector<T, N>, b: Vector<T, N>): Vector<T, N> {
  return asVector<T, N>(zipComponents(a, b, (p, q) => p + q));
}

export function subVec<T extends Tag, N extends Arity>(a: Vector<T, N>, b: Vector<T, N>): Vector<T, N> {
  return asVector<T, N>(zipComponents(a, b, (p, q) => p - q));
}

/** Multiply by a plain scalar */
export function scale<T extends Tag, N extends Arity>(v: Vector<T, N>, factor: number): Vector<T, N> {
  return asVector<T, N>(mapComponents(v, (c) => c * factor));
}

/** Divide by a plain scalar */
export function divScalar<T extends Tag, N extends Arity>(v: Vector<T, N>, divisor: number): Vector<T, N> {
  return asVector<T, N>(mapComponents(v, (c) => c / divisor));
}

export function negate<T extends Tag, N extends Arity>(v: Vector<T, N>): Vector<T, N> {
  return asVector<T, N>(mapComponents(v, (c) => -c));
}

/** Component-wise product */
export function hadamard<T extends Tag, N extends Arity>(a: Vector<T, N>, b: Vector<T, N>): Vector<T, N> {
  return asVector<T, N>(zipComponents(a, b, (p, q) => p * q));
}

/**
 * Dot product. The result is a plain number: its dimension would be the
 * square of T, which has no tag of its own.
 */
export function dot<T extends Tag, N extends Arity>(a: Vector<T, N>, b: Vector<T, N>): number {
  return dotComponents(a, b);
}

/** Cross product, defined for 3-component vectors only */
export function cross<T extends Tag>(a: Vector3<T>, b: Vector3<T>): Vector3<T> {
  return vec3<T>(a[1] * b[2] - a[2] * b[1], a[2] * b[0] - a[0] * b[2], a[0] * b[1] - a[1] * b[0]);
}

/** z component of the 3D cross product of two planar vectors */
export function perpDot<T extends Tag>(a: Vector2<T>, b: Vector2<T>): number {
  return a[0] * b[1] - a[1] * b[0];
}

/** Rotated a quarter turn counter-clockwise */
export function perp<T extends Tag>(v: Vector2<T>): Vector2<T> {
  return vec2<T>(-v[1], v[0]);
}

// ============================================================================
// Length
// ============================================================================

export function magnitude<T extends Tag, N extends Arity>(v: Vector<T, N>): Quantity<T> {
  return quantity<T>(normComponents(v));
}

export function magnitudeSquared<T extends Tag, N extends Arity>(v: Vector<T, N>): number {
  return dotComponents(v, v);
}

/**
 * The unit-length direction of `v`.
 *
 * Fails with a DegenerateInputError when the magnitude is zero or not
 * finite (any NaN or infinite component).
 */
export function normalize<T extends Tag, N extends Arity>(
  v: Vector<T, N>
): Either.Either<Direction<T, N>, DegenerateInputError> {
  const m = normComponents(v);
  if (m === 0 || !Number.isFinite(m)) {
    return Either.left(
      new DegenerateInputError("normalize", `cannot normalize a vector of magnitude ${m}`)
    );
  }
  return Either.right(asDirection<T, N>(mapComponents(v, (c) => c / m)));
}

/** Normalize without the degeneracy check; a zero vector yields NaN components */
export function normalizeUnchecked<T extends Tag, N extends Arity>(v: Vector<T, N>): Direction<T, N> {
  const m = normComponents(v);
  return asDirection<T, N>(mapComponents(v, (c) => c / m));
}

/** Same direction, new length. Fails like `normalize`. */
export function withMagnitude<T extends Tag, N extends Arity>(
  v: Vector<T, N>,
  length: Quantity<T>
): Either.Either<Vector<T, N>, DegenerateInputError> {
  return Either.map(normalize(v), (d) => asVector<T, N>(mapComponents(d, (c) => c * length)));
}

// ============================================================================
// Interpolation and Bounds
// ============================================================================

export function lerpVec<T extends Tag, N extends Arity>(
  a: Vector<T, N>,
  b: Vector<T, N>,
  t: number
): Vector<T, N> {
  return asVector<T, N>(zipComponents(a, b, (p, q) => p + (q - p) * t));
}

export function minVec<T extends Tag, N extends Arity>(a: Vector<T, N>, b: Vector<T, N>): Vector<T, N> {
  return asVector<T, N>(zipComponents(a, b, Math.min));
}

export function maxVec<T extends Tag, N extends Arity>(a: Vector<T, N>, b: Vector<T, N>): Vector<T, N> {
  return asVector<T, N>(zipComponents(a, b, Math.max));
}

/** Component-wise clamp into `[lo, hi]` */
export function clampVec<T extends Tag, N extends Arity>(
  v: Vector<T, N>,
  lo: Vector<T, N>,
  hi: Vector<T, N>
): Vector<T, N> {
  return asVector<T, N>(zipComponents(zipComponents(v, lo, Math.max), hi, Math.min));
}

/** Index and value of the smallest component; ties go to the lowest index */
export function minComponent<T extends Tag, N extends Arity>(v: Vector<T, N>): readonly [number, Quantity<T>] {
  const c: readonly number[] = v;
  let best = 0;
  for (let i = 1; i < c.length; i++) {
    if (c[i] < c[best]) best = i;
  }
  return [best, quantity<T>(c[best])];
}

/** Index and value of the largest component; ties go to the lowest index */
export function maxComponent<T extends Tag, N extends Arity>(v: Vector<T, N>): readonly [number, Quantity<T>] {
  const c: readonly number[] = v;
  let best = 0;
  for (let i = 1; i < c.length; i++) {
    if (c[i] > c[best]) best = i;
  }
  return [best, quantity<T>(c[best])];
}

// ============================================================================
// Angles
// ============================================================================

/** Angle from the +x axis, counter-clockwise, in `(-π, π]` */
export function heading<T extends Tag>(v: Vector2<T>): Angle<Radians> {
  return atan2(v[1], v[0]);
}

/** Rotate counter-clockwise */
export function rotate<T extends Tag>(v: Vector2<T>, angle: Angle<Radians>): Vector2<T> {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return vec2<T>(v[0] * c - v[1] * s, v[0] * s + v[1] * c);
}

/**
 * Unsigned angle between two vectors, in `[0, π]`.
 * Fails when either vector has zero or non-finite magnitude.
 */
export function angleBetween<T extends Tag, N extends Arity>(
  a: Vector<T, N>,
  b: Vector<T, N>
): Either.Either<Angle<Radians>, DegenerateInputError> {
  const na = normComponents(a);
  const nb = normComponents(b);
  if (na === 0 || nb === 0 || !Number.isFinite(na) || !Number.isFinite(nb)) {
    return Either.left(
      new DegenerateInputError("angleBetween", "angle with a zero or non-finite vector is undefined")
    );
  }
  const ua = mapComponents(a, (c) => c / na);
  const ub = mapComponents(b, (c) => c / nb);
  const cos = Math.max(-1, Math.min(1, dotComponents(ua, ub)));
  return Either.right(quantity<Radians>(Math.acos(cos)));
}

/** Reflect `v` off a surface with unit normal `normal` */
export function reflect<T extends Tag, N extends Arity>(
  v: Vector<T, N>,
  normal: Direction<T, N>
): Vector<T, N> {
  const d = 2 * dotComponents(v, normal);
  return asVector<T, N>(zipComponents(v, normal, (c, n) => c - d * n));
}

/** Component of `v` along `onto`. Fails when `onto` is zero. */
export function project<T extends Tag, N extends Arity>(
  v: Vector<T, N>,
  onto: Vector<T, N>
): Either.Either<Vector<T, N>, DegenerateInputError> {
  const n = normComponents(onto);
  if (n === 0 || !Number.isFinite(n)) {
    return Either.left(new DegenerateInputError("project", "cannot project onto a zero vector"));
  }
  const unit = mapComponents(onto, (c) => c / n);
  const k = dotComponents(v, unit);
  return Either.right(asVector<T, N>(mapComponents(unit, (c) => c * k)));
}

// ============================================================================
// Comparison and Conversion
// ============================================================================

export function approxEqualsVec<T extends Tag, N extends Arity>(
  a: Vector<T, N>,
  b: Vector<T, N>,
  tolerance: number = getSettings().tolerance
): boolean {
  return approxEqualComponents(a, b, tolerance);
}

/**
 * Re-express a vector in another unit of the same family. Vectors are
 * differences, so unit offsets never apply.
 */
export function convertVector<A extends Tag, B extends SameFamily<A>, N extends Arity>(
  v: Vector<A, N>,
  from: UnitDef<A>,
  to: UnitDef<B>
): Vector<B, N> {
  return asVector<B, N>(mapComponents(v, (c) => convertDeltaValue(c, from, to)));
}
