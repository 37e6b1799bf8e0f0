/**
 * Unit Conversion Table
 *
 * Each entry relates one tag to the base unit of its family:
 *
 *   base = value * scale + offset
 *
 * so any two units of a family convert through the base without a path
 * search, and adding a unit means stating only its own relation to the
 * base. Entries share their tag's name (`Meters` is both the tag type and
 * its table entry) and double as constructors: `Meters.of(3)`.
 *
 * Conversions are always explicit calls; nothing here coerces.
 */

import { quantity, type Quantity } from "./quantity.js";
import type { FamilyOf, NameOf, SameFamily, Tag } from "./tags.js";

// ============================================================================
// Table Entries
// ============================================================================

/** The numeric relation of a unit to its family base */
export interface UnitScale {
  /** Multiplier taking a value in this unit to the base unit */
  readonly scale: number;
  /** Added after scaling; zero for every family except temperature */
  readonly offset: number;
}

export interface UnitDef<T extends Tag> extends UnitScale {
  readonly name: NameOf<T>;
  readonly family: FamilyOf<T>;
  readonly symbol: string;
  of(value: number): Quantity<T>;
}

export interface UnitSpec<T extends Tag> {
  name: NameOf<T>;
  family: FamilyOf<T>;
  symbol: string;
  scale: number;
  offset?: number;
}

/**
 * Create a table entry for tag T.
 *
 * @throws RangeError if `scale` is zero or not finite, or `offset` is not finite
 *
 * @example
 * ```typescript
 * type Furlongs = Tag<"length", "furlongs">;
 * const Furlongs = defineUnit<Furlongs>({
 *   name: "furlongs",
 *   family: "length",
 *   symbol: "fur",
 *   scale: 201.168,
 * });
 * ```
 */
export function defineUnit<T extends Tag>(spec: UnitSpec<T>): UnitDef<T> {
  if (!Number.isFinite(spec.scale) || spec.scale === 0) {
    throw new RangeError(`Unit ${spec.name}: scale must be finite and non-zero, got ${spec.scale}`);
  }
  const offset = spec.offset ?? 0;
  if (!Number.isFinite(offset)) {
    throw new RangeError(`Unit ${spec.name}: offset must be finite, got ${offset}`);
  }
  const def: UnitDef<T> = {
    name: spec.name,
    family: spec.family,
    symbol: spec.symbol,
    scale: spec.scale,
    offset,
    of: (value) => quantity<T>(value),
  };
  return Object.freeze(def);
}

// ============================================================================
// Conversion
// ============================================================================

/** Convert an absolute value between two units of one family */
export function convertValue(value: number, from: UnitScale, to: UnitScale): number {
  if (from === to) return value;
  return (value * from.scale + from.offset - to.offset) / to.scale;
}

/** Convert a difference between two values; offsets cancel */
export function convertDeltaValue(value: number, from: UnitScale, to: UnitScale): number {
  if (from === to) return value;
  return (value * from.scale) / to.scale;
}

/**
 * Convert a quantity to another unit of the same family.
 *
 * @example
 * ```typescript
 * convert(Meters.of(1), Meters, Feet);   // ≈ 3.28084 ft
 * convert(Meters.of(1), Meters, Degrees); // Compile error: different family
 * ```
 */
export function convert<A extends Tag, B extends SameFamily<A>>(
  q: Quantity<A>,
  from: UnitDef<A>,
  to: UnitDef<B>
): Quantity<B> {
  return quantity<B>(convertValue(q, from, to));
}

/**
 * Convert a quantity that represents a difference. For offset families
 * (temperature) a difference of 1 K is a difference of 1 °C.
 */
export function convertDelta<A extends Tag, B extends SameFamily<A>>(
  q: Quantity<A>,
  from: UnitDef<A>,
  to: UnitDef<B>
): Quantity<B> {
  return quantity<B>(convertDeltaValue(q, from, to));
}

/** How many `to` units make one `from` unit. Ignores offsets. */
export function conversionFactor<A extends Tag, B extends SameFamily<A>>(
  from: UnitDef<A>,
  to: UnitDef<B>
): number {
  return from.scale / to.scale;
}

/** `"3 ft"`, or just the number for unitless values */
export function formatQuantity<T extends Tag>(q: Quantity<T>, unit: UnitDef<T>): string {
  return unit.symbol ? `${q} ${unit.symbol}` : `${q}`;
}

// ============================================================================
// Built-in Units
// ============================================================================

// Length (base: meters)
export type Meters = Tag<"length", "meters">;
export type Kilometers = Tag<"length", "kilometers">;
export type Centimeters = Tag<"length", "centimeters">;
export type Millimeters = Tag<"length", "millimeters">;
export type Feet = Tag<"length", "feet">;
export type Inches = Tag<"length", "inches">;
export type Yards = Tag<"length", "yards">;
export type Miles = Tag<"length", "miles">;

export const Meters = defineUnit<Meters>({ name: "meters", family: "length", symbol: "m", scale: 1 });
export const Kilometers = defineUnit<Kilometers>({
  name: "kilometers",
  family: "length",
  symbol: "km",
  scale: 1000,
});
export const Centimeters = defineUnit<Centimeters>({
  name: "centimeters",
  family: "length",
  symbol: "cm",
  scale: 0.01,
});
export const Millimeters = defineUnit<Millimeters>({
  name: "millimeters",
  family: "length",
  symbol: "mm",
  scale: 0.001,
});
export const Feet = defineUnit<Feet>({ name: "feet", family: "length", symbol: "ft", scale: 0.3048 });
export const Inches = defineUnit<Inches>({
  name: "inches",
  family: "length",
  symbol: "in",
  scale: 0.0254,
});
export const Yards = defineUnit<Yards>({ name: "yards", family: "length", symbol: "yd", scale: 0.9144 });
export const Miles = defineUnit<Miles>({
  name: "miles",
  family: "length",
  symbol: "mi",
  scale: 1609.344,
});

// Angle (base: radians)
export type Radians = Tag<"angle", "radians">;
export type Degrees = Tag<"angle", "degrees">;
export type Turns = Tag<"angle", "turns">;

export const Radians = defineUnit<Radians>({ name: "radians", family: "angle", symbol: "rad", scale: 1 });
export const Degrees = defineUnit<Degrees>({
  name: "degrees",
  family: "angle",
  symbol: "°",
  scale: Math.PI / 180,
});
export const Turns = defineUnit<Turns>({
  name: "turns",
  family: "angle",
  symbol: "turn",
  scale: 2 * Math.PI,
});

// Time (base: seconds)
export type Seconds = Tag<"time", "seconds">;
export type Milliseconds = Tag<"time", "milliseconds">;
export type Minutes = Tag<"time", "minutes">;
export type Hours = Tag<"time", "hours">;

export const Seconds = defineUnit<Seconds>({ name: "seconds", family: "time", symbol: "s", scale: 1 });
export const Milliseconds = defineUnit<Milliseconds>({
  name: "milliseconds",
  family: "time",
  symbol: "ms",
  scale: 0.001,
});
export const Minutes = defineUnit<Minutes>({ name: "minutes", family: "time", symbol: "min", scale: 60 });
export const Hours = defineUnit<Hours>({ name: "hours", family: "time", symbol: "h", scale: 3600 });

// Mass (base: kilograms)
export type Kilograms = Tag<"mass", "kilograms">;
export type Grams = Tag<"mass", "grams">;
export type Pounds = Tag<"mass", "pounds">;

export const Kilograms = defineUnit<Kilograms>({
  name: "kilograms",
  family: "mass",
  symbol: "kg",
  scale: 1,
});
export const Grams = defineUnit<Grams>({ name: "grams", family: "mass", symbol: "g", scale: 0.001 });
export const Pounds = defineUnit<Pounds>({
  name: "pounds",
  family: "mass",
  symbol: "lb",
  scale: 0.45359237,
});

// Temperature (base: kelvin). Absolute temperatures; differences go through convertDelta.
export type Kelvin = Tag<"temperature", "kelvin">;
export type Celsius = Tag<"temperature", "celsius">;
export type Fahrenheit = Tag<"temperature", "fahrenheit">;

export const Kelvin = defineUnit<Kelvin>({ name: "kelvin", family: "temperature", symbol: "K", scale: 1 });
export const Celsius = defineUnit<Celsius>({
  name: "celsius",
  family: "temperature",
  symbol: "°C",
  scale: 1,
  offset: 273.15,
});
export const Fahrenheit = defineUnit<Fahrenheit>({
  name: "fahrenheit",
  family: "temperature",
  symbol: "°F",
  scale: 5 / 9,
  offset: 273.15 - (32 * 5) / 9,
});

/** Values with no unit and no space */
export type Unitless = Tag<"unitless", "unitless">;

export const Unitless = defineUnit<Unitless>({
  name: "unitless",
  family: "unitless",
  symbol: "",
  scale: 1,
});
