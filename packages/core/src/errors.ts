/**
 * Raised while a session is being constructed, before any bar runs.
 * `path` names the offending config key or parameter path.
 */
export class ConfigurationError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ConfigurationError";
    this.path = path;
  }
}

/**
 * An internal value escaped its declared bound. Indicates a programming error,
 * never caught by the session loop.
 */
export class NumericRangeViolation extends Error {
  readonly quantity: string;
  readonly value: number;
  readonly min: number;
  readonly max: number;

  constructor(quantity: string, value: number, min: number, max: number) {
    super(`${quantity}=${value} outside [${min}, ${max}]`);
    this.name = "NumericRangeViolation";
    this.quantity = quantity;
    this.value = value;
    this.min = min;
    this.max = max;
  }
}

const RANGE_EPSILON = 1e-9;

export function assertInRange(quantity: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min - RANGE_EPSILON || value > max + RANGE_EPSILON) {
    throw new NumericRangeViolation(quantity, value, min, max);
  }
}
