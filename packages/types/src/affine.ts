/**
 * 2D affine transforms between coordinate spaces.
 *
 * `Affine2<From, To>` maps points tagged `From` to points tagged `To`, which
 * is the only way a value changes space. Storage is six numbers in column
 * order, `[m00, m01, m10, m11, m20, m21]`:
 *
 *   x' = m00 * x + m10 * y + m20
 *   y' = m01 * x + m11 * y + m21
 *
 * the same layout as gl-matrix's `mat2d`.
 */

import { Either } from "effect";
import type { Angle } from "./angle.js";
import { DegenerateInputError } from "./errors.js";
import { approxEqualComponents } from "./geometry.js";
import { point2, type Point2 } from "./point.js";
import { getSettings } from "./settings.js";
import type { Tag, ViewSpace, WorldSpace } from "./tags.js";
import type { Radians, Unitless } from "./units.js";
import { vec2, type Vector2 } from "./vector.js";

declare const fromSpace: unique symbol;
declare const toSpace: unique symbol;

export type Matrix2x3 = readonly [number, number, number, number, number, number];

export type Affine2<From extends Tag = Unitless, To extends Tag = From> = Matrix2x3 & {
  readonly [fromSpace]: (space: From) => From;
  readonly [toSpace]: (space: To) => To;
};

function asAffine<From extends Tag, To extends Tag>(m: Matrix2x3): Affine2<From, To> {
  return m as Affine2<From, To>;
}

// ============================================================================
// Constructors
// ============================================================================

export function affine2<From extends Tag = Unitless, To extends Tag = From>(
  m00: number,
  m01: number,
  m10: number,
  m11: number,
  m20: number,
  m21: number
): Affine2<From, To> {
  return asAffine<From, To>([m00, m01, m10, m11, m20, m21]);
}

export function identity<S extends Tag = Unitless>(): Affine2<S, S> {
  return affine2<S, S>(1, 0, 0, 1, 0, 0);
}

export function fromTranslation<From extends Tag = Unitless, To extends Tag = From>(
  offset: Vector2<To>
): Affine2<From, To> {
  return affine2<From, To>(1, 0, 0, 1, offset[0], offset[1]);
}

/** Counter-clockwise rotation about the origin */
export function fromRotation<From extends Tag = Unitless, To extends Tag = From>(
  angle: Angle<Radians>
): Affine2<From, To> {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return affine2<From, To>(c, s, -s, c, 0, 0);
}

export function fromScale<From extends Tag = Unitless, To extends Tag = From>(factor: number): Affine2<From, To> {
  return affine2<From, To>(factor, 0, 0, factor, 0, 0);
}

export function fromNonuniformScale<From extends Tag = Unitless, To extends Tag = From>(
  sx: number,
  sy: number
): Affine2<From, To> {
  return affine2<From, To>(sx, 0, 0, sy, 0, 0);
}

/**
 * The view transform of a 2D camera: translate by `-position`, rotate by
 * `-rotation`, then scale by `1 / zoom`. A camera at `position` maps that
 * point to the origin of the view space.
 *
 * Fails when the zoom is zero or not finite.
 */
export function fromCamera<From extends Tag = WorldSpace, To extends Tag = ViewSpace>(
  position: Point2<From>,
  rotation: Angle<Radians>,
  zoom: number
): Either.Either<Affine2<From, To>, DegenerateInputError> {
  if (zoom === 0 || !Number.isFinite(zoom)) {
    return Either.left(new DegenerateInputError("fromCamera", `zoom must be finite and non-zero, got ${zoom}`));
  }
  const c = Math.cos(rotation) / zoom;
  const s = Math.sin(rotation) / zoom;
  const [px, py] = position;
  const m00 = c;
  const m01 = -s;
  const m10 = s;
  const m11 = c;
  return Either.right(
    affine2<From, To>(m00, m01, m10, m11, -(m00 * px + m10 * py), -(m01 * px + m11 * py))
  );
}

// ============================================================================
// Composition
// ============================================================================

/** `outer ∘ inner`: apply `inner` first, then `outer` */
export function compose<A extends Tag, B extends Tag, C extends Tag>(
  outer: Affine2<B, C>,
  inner: Affine2<A, B>
): Affine2<A, C> {
  const [a00, a01, a10, a11, a20, a21] = outer;
  const [b00, b01, b10, b11, b20, b21] = inner;
  return affine2<A, C>(
    a00 * b00 + a10 * b01,
    a01 * b00 + a11 * b01,
    a00 * b10 + a10 * b11,
    a01 * b10 + a11 * b11,
    a00 * b20 + a10 * b21 + a20,
    a01 * b20 + a11 * b21 + a21
  );
}

/** Compose left to right: `andThen(first, second)` applies `first` first */
export function andThen<A extends Tag, B extends Tag, C extends Tag>(
  first: Affine2<A, B>,
  second: Affine2<B, C>
): Affine2<A, C> {
  return compose(second, first);
}

export function determinant<From extends Tag, To extends Tag>(m: Affine2<From, To>): number {
  return m[0] * m[3] - m[1] * m[2];
}

/**
 * The transform taking `To` back to `From`.
 * Fails when the linear part is singular or not finite.
 */
export function inverse<From extends Tag, To extends Tag>(
  m: Affine2<From, To>
): Either.Either<Affine2<To, From>, DegenerateInputError> {
  const [a, b, c, d, tx, ty] = m;
  const det = a * d - b * c;
  if (det === 0 || !Number.isFinite(det)) {
    return Either.left(new DegenerateInputError("inverse", `matrix is not invertible (determinant ${det})`));
  }
  const inv = 1 / det;
  return Either.right(
    affine2<To, From>(d * inv, -b * inv, -c * inv, a * inv, (c * ty - d * tx) * inv, (b * tx - a * ty) * inv)
  );
}

// ============================================================================
// Application
// ============================================================================

export function applyToPoint<From extends Tag, To extends Tag>(m: Affine2<From, To>, p: Point2<From>): Point2<To> {
  return point2<To>(m[0] * p[0] + m[2] * p[1] + m[4], m[1] * p[0] + m[3] * p[1] + m[5]);
}

/** Vectors are displacements, so translation does not apply */
export function applyToVector<From extends Tag, To extends Tag>(
  m: Affine2<From, To>,
  v: Vector2<From>
): Vector2<To> {
  return vec2<To>(m[0] * v[0] + m[2] * v[1], m[1] * v[0] + m[3] * v[1]);
}

// ============================================================================
// Inspection
// ============================================================================

/** `[[m00, m01], [m10, m11], [m20, m21]]`: the x axis, the y axis, the translation */
export function toRows<From extends Tag, To extends Tag>(
  m: Affine2<From, To>
): readonly [readonly [number, number], readonly [number, number], readonly [number, number]] {
  return [
    [m[0], m[1]],
    [m[2], m[3]],
    [m[4], m[5]],
  ];
}

export function approxEqualsAffine<From extends Tag, To extends Tag>(
  a: Affine2<From, To>,
  b: Affine2<From, To>,
  tolerance: number = getSettings().tolerance
): boolean {
  return approxEqualComponents(a, b, tolerance);
}
