/**
 * Error Types
 *
 * Runtime failures are limited to mathematically undefined results on
 * particular inputs. They are returned as the `Left` of an `Either`, never
 * thrown by the checked operations.
 */

/**
 * Base class for runtime geometry failures.
 */
export class GeometryError extends Error {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message);
    this.name = "GeometryError";
  }
}

/**
 * The input has no defined result for the operation: normalizing a zero
 * vector, inverting a singular transform, a camera with zero zoom.
 */
export class DegenerateInputError extends GeometryError {
  constructor(operation: string, message: string) {
    super(`${operation}: ${message}`, operation);
    this.name = "DegenerateInputError";
  }
}
