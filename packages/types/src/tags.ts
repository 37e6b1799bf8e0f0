/**
 * Dimension tags
 *
 * A tag names one unit (meters, degrees) or one coordinate space (world,
 * view) inside a dimension family. Tags exist only in the type system:
 * nothing ever constructs one, and a value parameterized by a tag is the
 * same number or number array at runtime that it would be without it.
 *
 * Two tags are *compatible* only when identical, and *convertible* only
 * when they share a family. Every space is its own family, so moving a
 * value between spaces takes an explicit transform (see `affine.ts`).
 *
 * @example
 * ```typescript
 * type PlayerSpace = Space<"player">;
 *
 * const a = vec3<Meters>(1, 2, 3);
 * const b = vec3<Feet>(1, 2, 3);
 * addVec(a, b); // Compile error: Feet is not Meters
 * ```
 */

// ============================================================================
// Tag Type
// ============================================================================

/** Brand key for tag identity */
declare const tagBrand: unique symbol;

/**
 * A phantom marker identifying one unit or space within a family.
 * Never instantiated.
 */
export interface Tag<Family extends string = string, Name extends string = string> {
  readonly [tagBrand]: {
    readonly family: Family;
    readonly name: Name;
  };
}

/** The family a tag belongs to */
export type FamilyOf<T extends Tag> = T[typeof tagBrand]["family"];

/** The name of a tag within its family */
export type NameOf<T extends Tag> = T[typeof tagBrand]["name"];

/** Any tag of the same family as T */
export type SameFamily<T extends Tag> = Tag<FamilyOf<T>>;

/** `true` when A and B are the same tag */
export type Compatible<A extends Tag, B extends Tag> = [A] extends [B]
  ? [B] extends [A]
    ? true
    : false
  : false;

/** `true` when A and B belong to the same family */
export type Convertible<A extends Tag, B extends Tag> = [FamilyOf<A>] extends [FamilyOf<B>]
  ? [FamilyOf<B>] extends [FamilyOf<A>]
    ? true
    : false
  : false;

// ============================================================================
// Families
// ============================================================================

// Unit tags (Meters, Degrees, ...) are declared in units.ts beside their
// conversion table entries.

export type LengthTag = Tag<"length">;
export type AngleTag = Tag<"angle">;
export type TimeTag = Tag<"time">;
export type MassTag = Tag<"mass">;
export type TemperatureTag = Tag<"temperature">;

// ============================================================================
// Coordinate Spaces
// ============================================================================

/**
 * A coordinate space. The family is private to the space, so no two spaces
 * are ever convertible by a scale factor.
 *
 * @example
 * ```typescript
 * type MinimapSpace = Space<"minimap">;
 * const p = point2<MinimapSpace>(4, 8);
 * ```
 */
export type Space<Name extends string> = Tag<`space:${Name}`, Name>;

export type WorldSpace = Space<"world">;
export type LocalSpace = Space<"local">;
export type ViewSpace = Space<"view">;
export type ClipSpace = Space<"clip">;
export type TexelSpace = Space<"texel">;
export type ScreenSpace = Space<"screen">;
