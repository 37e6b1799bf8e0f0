/**
 * Conversion Interface Layer
 *
 * A `Conversion<Ours, Theirs>` moves a value between this library and a
 * third-party math library. Conversions go both ways and always by explicit
 * call; nothing is converted implicitly. The tag of `Ours` is chosen at the
 * call site, since other libraries carry no tags.
 *
 * @example
 * ```typescript
 * const v3 = vec3Conversion<Meters>();     // from @unitvec/interop-gl-matrix
 * const glv = toExternal(vec3<Meters>(1, 2, 3), v3);
 * const back = fromExternal(glv, v3);      // Vector3<Meters>
 * ```
 */

export interface Conversion<Ours, Theirs> {
  /** npm package the other side comes from, e.g. "gl-matrix" */
  readonly library: string;
  /** That library's type name, e.g. "vec3" */
  readonly target: string;
  /**
   * True when `from(to(v))` returns `v` exactly for every finite `v`.
   * Libraries storing single-precision floats are lossy.
   */
  readonly lossless: boolean;
  to(value: Ours): Theirs;
  from(value: Theirs): Ours;
}

export function defineConversion<Ours, Theirs>(conversion: Conversion<Ours, Theirs>): Conversion<Ours, Theirs> {
  return Object.freeze({ ...conversion });
}

export function toExternal<Ours, Theirs>(value: Ours, conversion: Conversion<Ours, Theirs>): Theirs {
  return conversion.to(value);
}

export function fromExternal<Ours, Theirs>(value: Theirs, conversion: Conversion<Ours, Theirs>): Ours {
  return conversion.from(value);
}

/** `from(to(value))` */
export function roundTrip<Ours, Theirs>(value: Ours, conversion: Conversion<Ours, Theirs>): Ours {
  return conversion.from(conversion.to(value));
}

/** The same conversion seen from the other side */
export function invertConversion<Ours, Theirs>(conversion: Conversion<Ours, Theirs>): Conversion<Theirs, Ours> {
  return defineConversion<Theirs, Ours>({
    library: conversion.library,
    target: conversion.target,
    lossless: conversion.lossless,
    to: (value) => conversion.from(value),
    from: (value) => conversion.to(value),
  });
}
