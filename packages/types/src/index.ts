/**
 * @unitvec/types: Dimension-tagged quantities, vectors, points and
 * transforms checked at compile time.
 *
 * Values are plain numbers and number arrays at runtime. Units and
 * coordinate spaces live in phantom type slots, so mixing meters with feet
 * or world space with view space fails to compile, and conversions are
 * always explicit calls.
 *
 * @packageDocumentation
 */

// Tags
export type {
  Tag,
  FamilyOf,
  NameOf,
  SameFamily,
  Compatible,
  Convertible,
  LengthTag,
  AngleTag,
  TimeTag,
  MassTag,
  TemperatureTag,
  Space,
  WorldSpace,
  LocalSpace,
  ViewSpace,
  ClipSpace,
  TexelSpace,
  ScreenSpace,
} from "./tags.js";

// Errors and settings
export { GeometryError, DegenerateInputError } from "./errors.js";
export { configure, getSettings, resetSettings, type Settings } from "./settings.js";

// Quantity
export {
  quantity,
  raw,
  add,
  sub,
  mul,
  div,
  ratio,
  neg,
  abs,
  sum,
  compare,
  equals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  min,
  max,
  clamp,
  approxEquals,
  type Quantity,
} from "./quantity.js";

// Unit conversion table
export {
  defineUnit,
  convert,
  convertDelta,
  convertValue,
  convertDeltaValue,
  conversionFactor,
  formatQuantity,
  Meters,
  Kilometers,
  Centimeters,
  Millimeters,
  Feet,
  Inches,
  Yards,
  Miles,
  Radians,
  Degrees,
  Turns,
  Seconds,
  Milliseconds,
  Minutes,
  Hours,
  Kilograms,
  Grams,
  Pounds,
  Kelvin,
  Celsius,
  Fahrenheit,
  Unitless,
  type UnitScale,
  type UnitDef,
  type UnitSpec,
} from "./units.js";

// Geometric shapes
export type { Arity, PointArity, Components, GeometryKind, Vector, Point, Direction } from "./geometry.js";

// Vectors
export {
  vec2,
  vec3,
  vec4,
  splat,
  zero,
  x,
  y,
  z,
  w,
  component,
  toArray,
  addVec,
  subVec,
  scale,
  divScalar,
  negate,
  hadamard,
  dot,
  cross,
  perpDot,
  perp,
  magnitude,
  magnitudeSquared,
  normalize,
  normalizeUnchecked,
  withMagnitude,
  lerpVec,
  minVec,
  maxVec,
  clampVec,
  minComponent,
  maxComponent,
  heading,
  rotate,
  angleBetween,
  reflect,
  project,
  approxEqualsVec,
  convertVector,
  type Vector2,
  type Vector3,
  type Vector4,
} from "./vector.js";

// Points
export {
  point2,
  point3,
  origin,
  px,
  py,
  pz,
  pointToArray,
  displacement,
  translate,
  retreat,
  distance,
  distanceSquared,
  midpoint,
  lerpPoint,
  rotateAround,
  approxEqualsPoint,
  convertPoint,
  type Point2,
  type Point3,
} from "./point.js";

// Directions
export {
  direction2,
  direction3,
  axis,
  along,
  flip,
  directionComponents,
  cosBetween,
  type Direction2,
  type Direction3,
  type Direction4,
} from "./direction.js";

// Angles
export {
  radians,
  degrees,
  turns,
  toRadians,
  toDegrees,
  sin,
  cos,
  tan,
  sinCos,
  asin,
  acos,
  atan,
  atan2,
  fullTurn,
  wrapAngle,
  wrapAngleSigned,
  angleDifference,
  addWrapped,
  subWrapped,
  type Angle,
} from "./angle.js";

// Affine transforms
export {
  affine2,
  identity,
  fromTranslation,
  fromRotation,
  fromScale,
  fromNonuniformScale,
  fromCamera,
  compose,
  andThen,
  determinant,
  inverse,
  applyToPoint,
  applyToVector,
  toRows,
  approxEqualsAffine,
  type Affine2,
  type Matrix2x3,
} from "./affine.js";

// Rectangles and curves
export {
  rect2,
  rectFromSize,
  width,
  height,
  size,
  center,
  area,
  containsPoint,
  intersects,
  intersection,
  union,
  type Rect2,
} from "./rect.js";
export {
  cubicBezier,
  bezierPoint,
  bezierDerivative,
  arcLength,
  parameterAtLength,
  DEFAULT_ARC_STEPS,
  type CubicBezier,
} from "./bezier.js";

// Interop
export {
  defineConversion,
  toExternal,
  fromExternal,
  roundTrip,
  invertConversion,
  type Conversion,
} from "./interop.js";

// Typeclasses
export {
  makeEq,
  makeOrd,
  eqQuantity,
  ordQuantity,
  showQuantity,
  eqVector,
  eqPoint,
  showVector,
  showPoint,
  additiveVector,
  type Eq,
  type Ord,
  type Ordering,
  type Show,
  type AdditiveGroup,
} from "./typeclasses.js";
