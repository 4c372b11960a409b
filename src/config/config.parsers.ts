import { BOOLEAN_TRUE_VALUES } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ensure integer for configuration values (ports, intervals, iteration counts)
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Parses an environment variable that must be one of a fixed set of values.
 *
 * Matching is case-insensitive. An unknown value is a configuration error, not a
 * fallback to the default.
 *
 * @param name - Variable name, used in the error message
 * @param value - The raw value
 * @param allowed - The accepted values
 * @param defaultValue - Returned when the variable is unset or empty
 * @throws {Error} If the value is set but not one of `allowed`
 * @example
 * ```
 * OTPV_VAULT_KEY_SOURCE=master-secret
 * // parseEnumWithDefault('OTPV_VAULT_KEY_SOURCE', value, ['password', 'master-secret'], 'password')
 * // Returns: 'master-secret'
 * ```
 */
export function parseEnumWithDefault<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T,
): T {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new Error(`Invalid ${name}: "${value}" (expected one of: ${allowed.join(', ')})`);
  }

  return match;
}

/**
 * Parses a positive integer, rejecting zero.
 * Intervals and timeouts of zero would either spin or never fire.
 */
export function parsePositiveNumberWithDefault(name: string, value: string | undefined, defaultValue: number): number {
  const parsed = parseNumberWithDefault(value, defaultValue);
  if (parsed === 0) {
    throw new Error(`${name} must be greater than zero`);
  }
  return parsed;
}
