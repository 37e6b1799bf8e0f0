import { Either } from "effect";
import { mat2d, vec2 as glVec2, vec3 as glVec3 } from "gl-matrix";
import { describe, expect, it } from "vitest";
import {
  affine2,
  applyToPoint,
  approxEqualsAffine,
  fromExternal,
  inverse,
  point2,
  point3,
  roundTrip,
  toExternal,
  vec2,
  vec3,
  vec4,
  type Meters,
  type ViewSpace,
  type WorldSpace,
} from "@unitvec/types";
import {
  mat2dConversion,
  point2Conversion,
  point3Conversion,
  vec2Conversion,
  vec3Conversion,
  vec4Conversion,
} from "../index.js";

describe("vector conversions", () => {
  it("writes components into a Float32Array", () => {
    const gl = toExternal(vec3<Meters>(1.5, -2, 0.25), vec3Conversion<Meters>());
    expect(gl).toBeInstanceOf(Float32Array);
    expect(Array.from(gl)).toEqual([1.5, -2, 0.25]);
  });

  it("round-trips values that fit in single precision", () => {
    expect(roundTrip(vec2(3, 4), vec2Conversion())).toEqual([3, 4]);
    expect(roundTrip(vec4(1, 2, 3, 0.5), vec4Conversion())).toEqual([1, 2, 3, 0.5]);
  });

  it("rounds other values to single precision", () => {
    const back = roundTrip(vec2(0.1, 0), vec2Conversion());
    expect(back[0]).not.toBe(0.1);
    expect(back[0]).toBeCloseTo(0.1, 6);
  });

  it("is flagged lossy", () => {
    const c = vec3Conversion();
    expect(c.lossless).toBe(false);
    expect(c.library).toBe("gl-matrix");
    expect(c.target).toBe("vec3");
  });

  it("lets gl-matrix do the arithmetic", () => {
    const c = vec3Conversion<Meters>();
    const sum = glVec3.add(
      glVec3.create(),
      toExternal(vec3<Meters>(1, 2, 3), c),
      toExternal(vec3<Meters>(4, 5, 6), c)
    );
    expect(fromExternal(sum, c)).toEqual([5, 7, 9]);
  });
});

describe("point conversions", () => {
  it("maps points onto vec2 and vec3", () => {
    expect(Array.from(toExternal(point2(1, 2), point2Conversion()))).toEqual([1, 2]);
    expect(fromExternal(glVec3.fromValues(4, 5, 6), point3Conversion<Meters>())).toEqual([4, 5, 6]);
    expect(roundTrip(point3(7, 8, 9), point3Conversion())).toEqual([7, 8, 9]);
  });
});

describe("mat2d conversion", () => {
  const c = mat2dConversion<WorldSpace, ViewSpace>();
  const m = affine2<WorldSpace, ViewSpace>(2, 0, 0, 4, 6, 8);

  it("keeps the layout", () => {
    expect(Array.from(toExternal(m, c))).toEqual([2, 0, 0, 4, 6, 8]);
    expect(roundTrip(m, c)).toEqual([2, 0, 0, 4, 6, 8]);
  });

  it("transforms points the way applyToPoint does", () => {
    const out = glVec2.transformMat2d(glVec2.create(), glVec2.fromValues(3, -1), toExternal(m, c));
    expect(Array.from(out)).toEqual([...applyToPoint(m, point2<WorldSpace>(3, -1))]);
  });

  it("inverts the way inverse does", () => {
    const glInverse = mat2d.invert(mat2d.create(), toExternal(m, c));
    expect(glInverse).not.toBeNull();
    if (glInverse === null) return;
    const ours = Either.getOrThrow(inverse(m));
    const theirs = fromExternal(glInverse, mat2dConversion<ViewSpace, WorldSpace>());
    expect(approxEqualsAffine(theirs, ours)).toBe(true);
  });
});
