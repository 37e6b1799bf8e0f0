import { Either } from "effect";
import { describe, expect, it } from "vitest";
import {
  addVec,
  angleBetween,
  approxEqualsVec,
  axis,
  Celsius,
  Centimeters,
  clampVec,
  component,
  convertVector,
  cross,
  DegenerateInputError,
  divScalar,
  dot,
  hadamard,
  heading,
  Kelvin,
  lerpVec,
  magnitude,
  magnitudeSquared,
  maxComponent,
  maxVec,
  Meters,
  minComponent,
  minVec,
  negate,
  normalize,
  normalizeUnchecked,
  perp,
  perpDot,
  project,
  radians,
  reflect,
  rotate,
  scale,
  splat,
  subVec,
  toArray,
  vec2,
  vec3,
  vec4,
  w,
  withMagnitude,
  x,
  y,
  z,
  zero,
  type Unitless,
} from "../index.js";

function leftOf<R, L>(result: Either.Either<R, L>): L {
  if (Either.isLeft(result)) return result.left;
  throw new Error("expected a Left");
}

describe("constructors", () => {
  it("builds plain arrays", () => {
    expect(vec2(1, 2)).toEqual([1, 2]);
    expect(vec3<Meters>(1, 2, 3)).toEqual([1, 2, 3]);
    expect(vec4(1, 2, 3, 4)).toEqual([1, 2, 3, 4]);
    expect(Array.isArray(vec3(0, 0, 1))).toBe(true);
  });

  it("fills with splat and zero", () => {
    expect(splat<Meters, 3>(2, 3)).toEqual([2, 2, 2]);
    expect(zero<Meters, 2>(2)).toEqual([0, 0]);
  });
});

describe("accessors", () => {
  const v = vec4<Meters>(1, 2, 3, 4);

  it("returns tagged components", () => {
    expect(x(v)).toBe(1);
    expect(y(v)).toBe(2);
    expect(z(v)).toBe(3);
    expect(w(v)).toBe(4);
    expect(component(v, 2)).toBe(3);
  });

  it("rejects an out-of-range index", () => {
    expect(() => component(v, 4)).toThrow(RangeError);
    expect(() => component(v, 1.5)).toThrow("component index 1.5 out of range for Vector4");
  });

  it("copies components out", () => {
    const copy = toArray(v);
    copy[0] = 99;
    expect(v[0]).toBe(1);
  });
});

describe("arithmetic", () => {
  it("adds and subtracts", () => {
    expect(addVec(vec3<Meters>(1, 2, 3), vec3<Meters>(4, 5, 6))).toEqual([5, 7, 9]);
    expect(subVec(vec2<Meters>(5, 5), vec2<Meters>(1, 2))).toEqual([4, 3]);
  });

  it("scales, divides and negates", () => {
    expect(scale(vec2(1, 2), 3)).toEqual([3, 6]);
    expect(divScalar(vec2(3, 6), 3)).toEqual([1, 2]);
    expect(negate(vec3(1, -2, 3))).toEqual([-1, 2, -3]);
    expect(hadamard(vec2(2, 3), vec2(4, 5))).toEqual([8, 15]);
  });

  it("is commutative and associative", () => {
    const a = vec3<Meters>(1.5, -2, 0.25);
    const b = vec3<Meters>(4, 0.5, -3);
    const c = vec3<Meters>(-1, 7, 2);
    expect(approxEqualsVec(addVec(a, b), addVec(b, a))).toBe(true);
    expect(approxEqualsVec(addVec(addVec(a, b), c), addVec(a, addVec(b, c)))).toBe(true);
  });
});

describe("products", () => {
  it("computes the dot product as a plain number", () => {
    expect(dot(vec3(1, 2, 3), vec3(4, 5, 6))).toBe(32);
  });

  it("computes the 3D cross product", () => {
    expect(cross(vec3(1, 0, 0), vec3(0, 1, 0))).toEqual([0, 0, 1]);
    expect(cross(vec3(2, 3, 4), vec3(5, 6, 7))).toEqual([-3, 6, -3]);
  });

  it("computes the 2D perp-dot product", () => {
    expect(perpDot(vec2(1, 0), vec2(0, 1))).toBe(1);
    expect(perpDot(vec2(0, 1), vec2(1, 0))).toBe(-1);
    expect(perp(vec2(1, 2))).toEqual([-2, 1]);
  });
});

describe("length", () => {
  it("returns magnitude as a quantity", () => {
    const v = vec3<Meters>(3, 4, 0);
    expect(magnitude(v)).toBe(5);
    expect(magnitudeSquared(v)).toBe(25);
  });

  it("normalizes to a unit direction", () => {
    const d = Either.getOrThrow(normalize(vec2<Meters>(3, 4)));
    expect(d[0]).toBeCloseTo(0.6, 12);
    expect(d[1]).toBeCloseTo(0.8, 12);
  });

  it("keeps a unit vector at magnitude 1", () => {
    const d = Either.getOrThrow(normalize(vec3(0, 0, 1)));
    expect(d).toEqual([0, 0, 1]);
  });

  it("refuses to normalize a zero vector", () => {
    const error = leftOf(normalize(zero<Meters, 3>(3)));
    expect(error).toBeInstanceOf(DegenerateInputError);
    expect(error.operation).toBe("normalize");
    expect(error.message).toBe("normalize: cannot normalize a vector of magnitude 0");
  });

  it("refuses non-finite vectors", () => {
    expect(Either.isLeft(normalize(vec2(NaN, 1)))).toBe(true);
    expect(Either.isLeft(normalize(vec2(Infinity, 0)))).toBe(true);
  });

  it("measures vectors whose squares leave the float range", () => {
    expect(magnitude(vec2<Meters>(3e200, 4e200)) / 5e200).toBeCloseTo(1, 12);
    expect(magnitude(vec2<Meters>(3e-200, 4e-200)) / 5e-200).toBeCloseTo(1, 12);
  });

  it("normalizes tiny and huge vectors", () => {
    expect(Either.getOrThrow(normalize(vec2(1e-200, 0)))).toEqual([1, 0]);
    const huge = Either.getOrThrow(normalize(vec2(1e200, 1e200)));
    expect(huge[0]).toBeCloseTo(Math.SQRT1_2, 12);
    expect(huge[1]).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it("skips the check when unchecked", () => {
    const d = normalizeUnchecked(vec2(0, 0));
    expect(d[0]).toBeNaN();
  });

  it("rescales to a new magnitude", () => {
    const v = Either.getOrThrow(withMagnitude(vec2<Meters>(3, 4), Meters.of(10)));
    expect(v[0]).toBeCloseTo(6, 12);
    expect(v[1]).toBeCloseTo(8, 12);
  });
});

describe("interpolation and bounds", () => {
  it("interpolates linearly", () => {
    expect(lerpVec(vec2(0, 0), vec2(10, 20), 0.25)).toEqual([2.5, 5]);
  });

  it("takes component-wise min, max and clamp", () => {
    expect(minVec(vec2(1, 5), vec2(3, 2))).toEqual([1, 2]);
    expect(maxVec(vec2(1, 5), vec2(3, 2))).toEqual([3, 5]);
    expect(clampVec(vec3(-1, 5, 2), vec3(0, 0, 0), vec3(3, 3, 3))).toEqual([0, 3, 2]);
  });

  it("finds extreme components with ties to the lowest index", () => {
    expect(minComponent(vec3(3, 1, 1))).toEqual([1, 1]);
    expect(maxComponent(vec3(2, 7, 7))).toEqual([1, 7]);
  });
});

describe("angles", () => {
  it("measures heading from +x", () => {
    expect(heading(vec2(0, 1))).toBeCloseTo(Math.PI / 2, 12);
    expect(heading(vec2(-1, 0))).toBeCloseTo(Math.PI, 12);
  });

  it("rotates counter-clockwise", () => {
    const r = rotate(vec2(1, 0), radians(Math.PI / 2));
    expect(r[0]).toBeCloseTo(0, 12);
    expect(r[1]).toBeCloseTo(1, 12);
  });

  it("measures the angle between vectors", () => {
    expect(Either.getOrThrow(angleBetween(vec2(1, 0), vec2(0, 2)))).toBeCloseTo(Math.PI / 2, 12);
    expect(Either.getOrThrow(angleBetween(vec2(1, 0), vec2(-3, 0)))).toBeCloseTo(Math.PI, 12);
    expect(leftOf(angleBetween(vec2(1, 0), vec2(0, 0))).operation).toBe("angleBetween");
  });

  it("measures angles between tiny vectors", () => {
    expect(Either.getOrThrow(angleBetween(vec2(1e-170, 0), vec2(0, 1e-170)))).toBeCloseTo(Math.PI / 2, 12);
  });

  it("reflects off a surface normal", () => {
    expect(reflect(vec2(1, -1), axis<Unitless, 2>(1, 2))).toEqual([1, 1]);
  });

  it("projects onto another vector", () => {
    expect(Either.getOrThrow(project(vec2(3, 4), vec2(1, 0)))).toEqual([3, 0]);
    expect(Either.isLeft(project(vec2(3, 4), vec2(0, 0)))).toBe(true);
  });

  it("projects onto tiny and huge vectors", () => {
    expect(Either.getOrThrow(project(vec2(2e-200, 5e-200), vec2(1e-200, 0)))).toEqual([2e-200, 0]);
    expect(Either.getOrThrow(project(vec2(3e200, 4e200), vec2(1e200, 0)))).toEqual([3e200, 0]);
  });
});

describe("conversion", () => {
  it("converts by scale only", () => {
    const cm = convertVector(vec2<Meters>(1, 2), Meters, Centimeters);
    expect(cm[0]).toBeCloseTo(100, 10);
    expect(cm[1]).toBeCloseTo(200, 10);
  });

  it("does not apply unit offsets to vectors", () => {
    expect(convertVector(vec2<Celsius>(1, 2), Celsius, Kelvin)).toEqual([1, 2]);
  });

  it("compares within tolerance", () => {
    expect(approxEqualsVec(vec2(1, 2), vec2(1 + 1e-12, 2))).toBe(true);
    expect(approxEqualsVec(vec2(1, 2), vec2(1.1, 2), 0.01)).toBe(false);
  });
});
