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

  // Ports, timeouts and sizes are all integers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
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
 * Parses a base URL, dropping trailing slashes so paths can be appended.
 *
 * @param value - Raw URL from the environment
 * @param variable - Variable name used in the error message
 * @throws {Error} If the value is not an absolute http(s) URL
 * @example
 * ```
 * parseBaseUrl('https://issuer.example.com/', 'VCS_HOST_URL')
 * // Returns: 'https://issuer.example.com'
 * ```
 */
export function parseBaseUrl(value: string, variable: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    throw new Error(`${variable} must be an absolute URL (received: "${value}")`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`${variable} must use http or https (received: "${value}")`);
  }

  return parsed.toString().replace(/\/+$/, '');
}
