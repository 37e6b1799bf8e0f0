/**
 * Library-wide defaults.
 *
 * Held in memory and changed only through `configure`. Loading settings
 * from files or the environment is the job of `@unitvec/config`.
 */

export interface Settings {
  /** Default absolute tolerance for the approxEquals family */
  readonly tolerance: number;
}

const DEFAULT_SETTINGS: Settings = {
  tolerance: 1e-9,
};

let current: Settings = DEFAULT_SETTINGS;

/**
 * Override one or more defaults.
 *
 * @throws RangeError if the tolerance is not a finite positive number
 */
export function configure(overrides: Partial<Settings>): Settings {
  const next = { ...current, ...overrides };
  if (!Number.isFinite(next.tolerance) || next.tolerance <= 0) {
    throw new RangeError(`tolerance must be a finite positive number, got ${next.tolerance}`);
  }
  current = next;
  return current;
}

export function getSettings(): Settings {
  return current;
}

export function resetSettings(): Settings {
  current = DEFAULT_SETTINGS;
  return current;
}
