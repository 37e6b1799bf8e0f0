/**
 * Directions
 *
 * A `Direction<T, N>` is what `normalize` produces: a unit-length heading
 * that remembers the tag of the vector it came from but has no magnitude.
 * Scaling it back up by a `Quantity<T>` yields a `Vector<T, N>` again.
 */

import { Either } from "effect";
import { DegenerateInputError } from "./errors.js";
import {
  asDirection,
  asVector,
  dotComponents,
  mapComponents,
  normComponents,
  type Arity,
  type Direction,
  type Vector,
} from "./geometry.js";
import type { Quantity } from "./quantity.js";
import type { Tag } from "./tags.js";
import type { Unitless } from "./units.js";

export type Direction2<T extends Tag = Unitless> = Direction<T, 2>;
export type Direction3<T extends Tag = Unitless> = Direction<T, 3>;
export type Direction4<T extends Tag = Unitless> = Direction<T, 4>;

/**
 * Build a direction from raw components, normalizing them.
 * Fails when the components have zero or non-finite length.
 */
export function direction2<T extends Tag = Unitless>(
  x: number,
  y: number
): Either.Either<Direction2<T>, DegenerateInputError> {
  return fromComponents<T, 2>([x, y]);
}

export function direction3<T extends Tag = Unitless>(
  x: number,
  y: number,
  z: number
): Either.Either<Direction3<T>, DegenerateInputError> {
  return fromComponents<T, 3>([x, y, z]);
}

function fromComponents<T extends Tag, N extends Arity>(
  c: readonly number[]
): Either.Either<Direction<T, N>, DegenerateInputError> {
  const m = normComponents(c);
  if (m === 0 || !Number.isFinite(m)) {
    return Either.left(new DegenerateInputError("direction", `components have length ${m}`));
  }
  return Either.right(asDirection<T, N>(c.map((v) => v / m)));
}

/** Unit vector along axis `index` (0 is x) */
export function axis<T extends Tag, N extends Arity>(index: number, arity: N): Direction<T, N> {
  if (!Number.isInteger(index) || index < 0 || index >= arity) {
    throw new RangeError(`axis ${index} out of range for arity ${arity}`);
  }
  const c = new Array<number>(arity).fill(0);
  c[index] = 1;
  return asDirection<T, N>(c);
}

/** A vector of the given length pointing along `d` */
export function along<T extends Tag, N extends Arity>(d: Direction<T, N>, length: Quantity<T>): Vector<T, N> {
  return asVector<T, N>(mapComponents(d, (c) => c * length));
}

export function flip<T extends Tag, N extends Arity>(d: Direction<T, N>): Direction<T, N> {
  return asDirection<T, N>(mapComponents(d, (c) => -c));
}

/** The raw unitless components */
export function directionComponents<T extends Tag, N extends Arity>(d: Direction<T, N>): number[] {
  const c: readonly number[] = d;
  return [...c];
}

/** Cosine of the angle between two directions, clamped to `[-1, 1]` */
export function cosBetween<T extends Tag, N extends Arity>(a: Direction<T, N>, b: Direction<T, N>): number {
  return Math.max(-1, Math.min(1, dotComponents(a, b)));
}
