/**
 * Axis-aligned rectangles in a tagged space.
 */

import { point2, type Point2 } from "./point.js";
import { quantity, type Quantity } from "./quantity.js";
import type { Tag } from "./tags.js";
import type { Unitless } from "./units.js";
import { vec2, type Vector2 } from "./vector.js";

export interface Rect2<T extends Tag = Unitless> {
  readonly min: Point2<T>;
  readonly max: Point2<T>;
}

/** A rectangle spanning two corners, in either order */
export function rect2<T extends Tag>(a: Point2<T>, b: Point2<T>): Rect2<T> {
  return {
    min: point2<T>(Math.min(a[0], b[0]), Math.min(a[1], b[1])),
    max: point2<T>(Math.max(a[0], b[0]), Math.max(a[1], b[1])),
  };
}

/** A rectangle from its minimum corner and size; negative sizes become 0 */
export function rectFromSize<T extends Tag>(min: Point2<T>, size: Vector2<T>): Rect2<T> {
  return {
    min,
    max: point2<T>(min[0] + Math.max(0, size[0]), min[1] + Math.max(0, size[1])),
  };
}

export function width<T extends Tag>(r: Rect2<T>): Quantity<T> {
  return quantity<T>(r.max[0] - r.min[0]);
}

export function height<T extends Tag>(r: Rect2<T>): Quantity<T> {
  return quantity<T>(r.max[1] - r.min[1]);
}

export function size<T extends Tag>(r: Rect2<T>): Vector2<T> {
  return vec2<T>(r.max[0] - r.min[0], r.max[1] - r.min[1]);
}

export function center<T extends Tag>(r: Rect2<T>): Point2<T> {
  return point2<T>((r.min[0] + r.max[0]) / 2, (r.min[1] + r.max[1]) / 2);
}

/** Area as a plain number (units squared) */
export function area<T extends Tag>(r: Rect2<T>): number {
  return (r.max[0] - r.min[0]) * (r.max[1] - r.min[1]);
}

/** Inclusive of the boundary */
export function containsPoint<T extends Tag>(r: Rect2<T>, p: Point2<T>): boolean {
  return p[0] >= r.min[0] && p[0] <= r.max[0] && p[1] >= r.min[1] && p[1] <= r.max[1];
}

/** True when the rectangles share any point, including an edge */
export function intersects<T extends Tag>(a: Rect2<T>, b: Rect2<T>): boolean {
  return a.min[0] <= b.max[0] && b.min[0] <= a.max[0] && a.min[1] <= b.max[1] && b.min[1] <= a.max[1];
}

/** The overlap of two rectangles, or undefined when they are disjoint */
export function intersection<T extends Tag>(a: Rect2<T>, b: Rect2<T>): Rect2<T> | undefined {
  if (!intersects(a, b)) return undefined;
  return {
    min: point2<T>(Math.max(a.min[0], b.min[0]), Math.max(a.min[1], b.min[1])),
    max: point2<T>(Math.min(a.max[0], b.max[0]), Math.min(a.max[1], b.max[1])),
  };
}

/** The smallest rectangle containing both */
export function union<T extends Tag>(a: Rect2<T>, b: Rect2<T>): Rect2<T> {
  return {
    min: point2<T>(Math.min(a.min[0], b.min[0]), Math.min(a.min[1], b.min[1])),
    max: point2<T>(Math.max(a.max[0], b.max[0]), Math.max(a.max[1], b.max[1])),
  };
}
