/**
 * @unitvec/interop-gl-matrix: Conversions between unitvec values and
 * gl-matrix arrays.
 *
 * gl-matrix carries no tags, so each factory takes the tag of the unitvec
 * side as a type argument:
 *
 * ```typescript
 * import { vec3Conversion } from "@unitvec/interop-gl-matrix";
 * import { fromExternal, toExternal, vec3, type Meters } from "@unitvec/types";
 *
 * const meters = vec3Conversion<Meters>();
 * const gl = toExternal(vec3<Meters>(1, 2, 3), meters); // Float32Array
 * const back = fromExternal(gl, meters);                // Vector3<Meters>
 * ```
 *
 * gl-matrix allocates `Float32Array`s by default, so every conversion here
 * is lossy: components round to single precision on the way out.
 *
 * @packageDocumentation
 */

import { mat2d, vec2 as glVec2, vec3 as glVec3, vec4 as glVec4 } from "gl-matrix";
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
  type Vector2,
  type Vector3,
  type Vector4,
} from "@unitvec/types";

export type GlVec2 = ReturnType<typeof glVec2.create>;
export type GlVec3 = ReturnType<typeof glVec3.create>;
export type GlVec4 = ReturnType<typeof glVec4.create>;
export type GlMat2d = ReturnType<typeof mat2d.create>;

const LIBRARY = "gl-matrix";

// ============================================================================
// Vectors
// ============================================================================

export function vec2Conversion<T extends Tag = Unitless>(): Conversion<Vector2<T>, GlVec2> {
  return defineConversion<Vector2<T>, GlVec2>({
    library: LIBRARY,
    target: "vec2",
    lossless: false,
    to: (v) => glVec2.fromValues(v[0], v[1]),
    from: (g) => vec2<T>(g[0], g[1]),
  });
}

export function vec3Conversion<T extends Tag = Unitless>(): Conversion<Vector3<T>, GlVec3> {
  return defineConversion<Vector3<T>, GlVec3>({
    library: LIBRARY,
    target: "vec3",
    lossless: false,
    to: (v) => glVec3.fromValues(v[0], v[1], v[2]),
    from: (g) => vec3<T>(g[0], g[1], g[2]),
  });
}

export function vec4Conversion<T extends Tag = Unitless>(): Conversion<Vector4<T>, GlVec4> {
  return defineConversion<Vector4<T>, GlVec4>({
    library: LIBRARY,
    target: "vec4",
    lossless: false,
    to: (v) => glVec4.fromValues(v[0], v[1], v[2], v[3]),
    from: (g) => vec4<T>(g[0], g[1], g[2], g[3]),
  });
}

// ============================================================================
// Points
// ============================================================================

/** Points map onto the same gl-matrix types as vectors */
export function point2Conversion<T extends Tag = Unitless>(): Conversion<Point2<T>, GlVec2> {
  return defineConversion<Point2<T>, GlVec2>({
    library: LIBRARY,
    target: "vec2",
    lossless: false,
    to: (p) => glVec2.fromValues(p[0], p[1]),
    from: (g) => point2<T>(g[0], g[1]),
  });
}

export function point3Conversion<T extends Tag = Unitless>(): Conversion<Point3<T>, GlVec3> {
  return defineConversion<Point3<T>, GlVec3>({
    library: LIBRARY,
    target: "vec3",
    lossless: false,
    to: (p) => glVec3.fromValues(p[0], p[1], p[2]),
    from: (g) => point3<T>(g[0], g[1], g[2]),
  });
}

// ============================================================================
// Transforms
// ============================================================================

/** `Affine2` and `mat2d` share the `[a, b, c, d, tx, ty]` layout */
export function mat2dConversion<From extends Tag = Unitless, To extends Tag = From>(): Conversion<
  Affine2<From, To>,
  GlMat2d
> {
  return defineConversion<Affine2<From, To>, GlMat2d>({
    library: LIBRARY,
    target: "mat2d",
    lossless: false,
    to: (m) => mat2d.fromValues(m[0], m[1], m[2], m[3], m[4], m[5]),
    from: (g) => affine2<From, To>(g[0], g[1], g[2], g[3], g[4], g[5]),
  });
}
