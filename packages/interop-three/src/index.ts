/**
 * @unitvec/interop-three: Conversions between unitvec values and three.js
 * math classes.
 *
 * three.js stores components as ordinary numbers, so vector and point
 * conversions are lossless. Each call to `to` allocates a new three.js
 * object; nothing is shared with the unitvec value.
 *
 * @packageDocumentation
 */

import { Matrix3, Vector2, Vector3, Vector4 } from "three";
import {
  affine2,
  defineConversion,
  point2,
  point3,
  vec2,
  vec3,
  vec4,
  type Affine2,
  type Conversion,
  type Point2,
  type Point3,
  type Tag,
  type Unitless,
  type Vector2 as UVector2,
  type Vector3 as UVector3,
  type Vector4 as UVector4,
} from "@unitvec/types";

const LIBRARY = "three";

// ============================================================================
// Vectors
// ============================================================================

export function vector2Conversion<T extends Tag = Unitless>(): Conversion<UVector2<T>, Vector2> {
  return defineConversion<UVector2<T>, Vector2>({
    library: LIBRARY,
    target: "Vector2",
    lossless: true,
    to: (v) => new Vector2(v[0], v[1]),
    from: (t) => vec2<T>(t.x, t.y),
  });
}

export function vector3Conversion<T extends Tag = Unitless>(): Conversion<UVector3<T>, Vector3> {
  return defineConversion<UVector3<T>, Vector3>({
    library: LIBRARY,
    target: "Vector3",
    lossless: true,
    to: (v) => new Vector3(v[0], v[1], v[2]),
    from: (t) => vec3<T>(t.x, t.y, t.z),
  });
}

export function vector4Conversion<T extends Tag = Unitless>(): Conversion<UVector4<T>, Vector4> {
  return defineConversion<UVector4<T>, Vector4>({
    library: LIBRARY,
    target: "Vector4",
    lossless: true,
    to: (v) => new Vector4(v[0], v[1], v[2], v[3]),
    from: (t) => vec4<T>(t.x, t.y, t.z, t.w),
  });
}

// ============================================================================
// Points
// ============================================================================

export function point2Conversion<T extends Tag = Unitless>(): Conversion<Point2<T>, Vector2> {
  return defineConversion<Point2<T>, Vector2>({
    library: LIBRARY,
    target: "Vector2",
    lossless: true,
    to: (p) => new Vector2(p[0], p[1]),
    from: (t) => point2<T>(t.x, t.y),
  });
}

export function point3Conversion<T extends Tag = Unitless>(): Conversion<Point3<T>, Vector3> {
  return defineConversion<Point3<T>, Vector3>({
    library: LIBRARY,
    target: "Vector3",
    lossless: true,
    to: (p) => new Vector3(p[0], p[1], p[2]),
    from: (t) => point3<T>(t.x, t.y, t.z),
  });
}

// ============================================================================
// Transforms
// ============================================================================

/**
 * `Affine2` as a homogeneous 3×3 matrix. The bottom row is written as
 * `(0, 0, 1)` and ignored on the way back, so a projective `Matrix3`
 * loses its projective part when converted to an `Affine2`.
 */
export function matrix3Conversion<From extends Tag = Unitless, To extends Tag = From>(): Conversion<
  Affine2<From, To>,
  Matrix3
> {
  return defineConversion<Affine2<From, To>, Matrix3>({
    library: LIBRARY,
    target: "Matrix3",
    lossless: true,
    to: (m) => new Matrix3().set(m[0], m[2], m[4], m[1], m[3], m[5], 0, 0, 1),
    from: (t) => {
      // column-major
      const e = t.elements;
      return affine2<From, To>(e[0], e[1], e[3], e[4], e[6], e[7]);
    },
  });
}
