// ──────────────────────────────────────────────
// Weft - Parameter check primitives
// Each raises ConfigurationError with a field-qualified message
// ──────────────────────────────────────────────

import { ConfigurationError } from "@weft/utils";

export function checkEmpty(value: string, field: string): void {
  if (!value.trim()) {
    throw new ConfigurationError(`${field} should not be empty`);
  }
}

export function checkPositiveNumber(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} ${value} should be a positive number`);
  }
}

export function checkNonnegativeNumber(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${field} ${value} should be a non-negative number`);
  }
}

export function checkPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${field} ${value} should be a positive integer`);
  }
}

export function checkValidValue<T extends string>(value: string, field: string, choices: readonly T[]): void {
  if (!choices.some((choice) => choice === value)) {
    throw new ConfigurationError(
      `${field} ${value} not supported, should be one of: ${choices.join(", ")}`
    );
  }
}

export function checkDecimalFloat(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(
      `${field} ${value} not supported, should be a float number in range [0, 1]`
    );
  }
}
