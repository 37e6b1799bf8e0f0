/**
 * Angles
 *
 * An angle is a quantity whose tag belongs to the angle family. Trigonometry
 * accepts radians only, so a value in degrees has to be converted first.
 *
 * @example
 * ```typescript
 * const a = degrees(90);
 * sin(toRadians(a, Degrees)); // 1
 * sin(a);                     // Compile error: degrees are not radians
 * ```
 */

import { quantity, type Quantity } from "./quantity.js";
import type { AngleTag } from "./tags.js";
import { convertDeltaValue, convertValue, Degrees, Radians, Turns, type UnitDef } from "./units.js";

export type Angle<T extends AngleTag = Radians> = Quantity<T>;

// ============================================================================
// Constructors
// ============================================================================

export function radians(value: number): Angle<Radians> {
  return Radians.of(value);
}

export function degrees(value: number): Angle<Degrees> {
  return Degrees.of(value);
}

export function turns(value: number): Angle<Turns> {
  return Turns.of(value);
}

export function toRadians<T extends AngleTag>(a: Angle<T>, unit: UnitDef<T>): Angle<Radians> {
  return quantity<Radians>(convertValue(a, unit, Radians));
}

export function toDegrees<T extends AngleTag>(a: Angle<T>, unit: UnitDef<T>): Angle<Degrees> {
  return quantity<Degrees>(convertValue(a, unit, Degrees));
}

// ============================================================================
// Trigonometry
// ============================================================================

export function sin(a: Angle<Radians>): number {
  return Math.sin(a);
}

export function cos(a: Angle<Radians>): number {
  return Math.cos(a);
}

export function tan(a: Angle<Radians>): number {
  return Math.tan(a);
}

/** `[sin, cos]` in one call */
export function sinCos(a: Angle<Radians>): readonly [number, number] {
  return [Math.sin(a), Math.cos(a)];
}

export function asin(x: number): Angle<Radians> {
  return radians(Math.asin(x));
}

export function acos(x: number): Angle<Radians> {
  return radians(Math.acos(x));
}

export function atan(x: number): Angle<Radians> {
  return radians(Math.atan(x));
}

export function atan2(y: number, x: number): Angle<Radians> {
  return radians(Math.atan2(y, x));
}

// ============================================================================
// Wrapping
// ============================================================================

/** One full turn expressed in `unit` */
export function fullTurn<T extends AngleTag>(unit: UnitDef<T>): Angle<T> {
  return quantity<T>(convertDeltaValue(2 * Math.PI, Radians, unit));
}

/** Wrap into `[0, full turn)` */
export function wrapAngle<T extends AngleTag>(a: Angle<T>, unit: UnitDef<T>): Angle<T> {
  const full = fullTurn(unit);
  let r = a % full;
  if (r < 0) r += full;
  // r + full can round up to exactly full for tiny negative r
  if (r >= full) r = 0;
  return quantity<T>(r);
}

/** Wrap into `[-half turn, half turn)` */
export function wrapAngleSigned<T extends AngleTag>(a: Angle<T>, unit: UnitDef<T>): Angle<T> {
  const half = fullTurn(unit) / 2;
  return quantity<T>(wrapAngle(quantity<T>(a + half), unit) - half);
}

/** Shortest signed rotation taking `from` to `to` */
export function angleDifference<T extends AngleTag>(
  from: Angle<T>,
  to: Angle<T>,
  unit: UnitDef<T>
): Angle<T> {
  return wrapAngleSigned(quantity<T>(to - from), unit);
}

export function addWrapped<T extends AngleTag>(a: Angle<T>, b: Angle<T>, unit: UnitDef<T>): Angle<T> {
  return wrapAngle(quantity<T>(a + b), unit);
}

export function subWrapped<T extends AngleTag>(a: Angle<T>, b: Angle<T>, unit: UnitDef<T>): Angle<T> {
  return wrapAngle(quantity<T>(a - b), unit);
}
