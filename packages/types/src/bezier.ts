/**
 * Cubic Bézier curves in a tagged 2D space, with arc length.
 */

import { point2, type Point2 } from "./point.js";
import { quantity, type Quantity } from "./quantity.js";
import { getSettings } from "./settings.js";
import type { Tag } from "./tags.js";
import type { Unitless } from "./units.js";
import { vec2, type Vector2 } from "./vector.js";

export interface CubicBezier<T extends Tag = Unitless> {
  readonly p0: Point2<T>;
  readonly p1: Point2<T>;
  readonly p2: Point2<T>;
  readonly p3: Point2<T>;
}

export const DEFAULT_ARC_STEPS = 64;

export function cubicBezier<T extends Tag>(
  p0: Point2<T>,
  p1: Point2<T>,
  p2: Point2<T>,
  p3: Point2<T>
): CubicBezier<T> {
  return { p0, p1, p2, p3 };
}

/** The point at parameter `t` (0 is `p0`, 1 is `p3`) */
export function bezierPoint<T extends Tag>(c: CubicBezier<T>, t: number): Point2<T> {
  const u = 1 - t;
  const b0 = u * u * u;
  const b1 = 3 * u * u * t;
  const b2 = 3 * u * t * t;
  const b3 = t * t * t;
  return point2<T>(
    b0 * c.p0[0] + b1 * c.p1[0] + b2 * c.p2[0] + b3 * c.p3[0],
    b0 * c.p0[1] + b1 * c.p1[1] + b2 * c.p2[1] + b3 * c.p3[1]
  );
}

/** The tangent (velocity) at parameter `t` */
export function bezierDerivative<T extends Tag>(c: CubicBezier<T>, t: number): Vector2<T> {
  const u = 1 - t;
  const k0 = 3 * u * u;
  const k1 = 6 * u * t;
  const k2 = 3 * t * t;
  return vec2<T>(
    k0 * (c.p1[0] - c.p0[0]) + k1 * (c.p2[0] - c.p1[0]) + k2 * (c.p3[0] - c.p2[0]),
    k0 * (c.p1[1] - c.p0[1]) + k1 * (c.p2[1] - c.p1[1]) + k2 * (c.p3[1] - c.p2[1])
  );
}

function speed<T extends Tag>(c: CubicBezier<T>, t: number): number {
  const d = bezierDerivative(c, t);
  return Math.hypot(d[0], d[1]);
}

/**
 * Length of the curve from 0 to `t`, by Simpson's rule over `steps`
 * intervals. An odd step count is rounded up to the next even one.
 *
 * @throws RangeError if `steps` is not a positive integer
 */
export function arcLength<T extends Tag>(
  c: CubicBezier<T>,
  t = 1,
  steps = DEFAULT_ARC_STEPS
): Quantity<T> {
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new RangeError(`steps must be a positive integer, got ${steps}`);
  }
  const n = steps % 2 === 0 ? steps : steps + 1;
  const h = t / n;
  let s = speed(c, 0) + speed(c, t);
  for (let i = 1; i < n; i++) {
    s += (i % 2 === 0 ? 2 : 4) * speed(c, i * h);
  }
  return quantity<T>((s * h) / 3);
}

/**
 * The parameter at which the curve has covered `length`. The target is
 * clamped to `[0, total length]`; the search bisects, then refines with a
 * few Newton steps.
 */
export function parameterAtLength<T extends Tag>(
  c: CubicBezier<T>,
  length: Quantity<T>,
  steps = DEFAULT_ARC_STEPS,
  tolerance: number = getSettings().tolerance
): number {
  const total = arcLength(c, 1, steps);
  const target = Math.max(0, Math.min(length, total));

  let low = 0;
  let high = 1;
  for (let i = 0; i < steps; i++) {
    const mid = (low + high) / 2;
    if (arcLength(c, mid, steps) < target) {
      low = mid;
    } else {
      high = mid;
    }
  }

  let t = (low + high) / 2;
  for (let i = 0; i < 5; i++) {
    const f = arcLength(c, t, steps) - target;
    const dt = speed(c, t);
    if (Math.abs(f) <= tolerance || dt === 0) break;
    t = Math.max(0, Math.min(1, t - f / dt));
  }
  return t;
}
