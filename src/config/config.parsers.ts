import * as process from 'process';
import { BOOLEAN_FALSE_VALUES, BOOLEAN_TRUE_VALUES } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (BOOLEAN_FALSE_VALUES.includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, timeouts and sizes are all whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - Returned when the value is missing or empty
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Reads a required environment variable.
 *
 * Credentials and hosts have no sensible default, so a missing value stops
 * the process at startup instead of failing later inside a cycle.
 *
 * @param name - Environment variable name
 * @throws {Error} If the variable is unset or blank
 */
export function parseRequiredString(name: string): string {
  const value = process.env[name];

  if (value === undefined || value.trim() === '') {
    throw new Error(`${name} is required`);
  }

  return value.trim();
}

/**
 * Resolves whether a connection should use implicit TLS.
 *
 * TLS is on when the explicit flag asks for it OR when the port is the
 * protocol's conventional implicit-TLS port (993 for IMAP, 465 for SMTP).
 *
 * @example
 * ```
 * resolveImplicitTls(false, 993, 993) // true
 * resolveImplicitTls(false, 143, 993) // false
 * ```
 */
export function resolveImplicitTls(explicitFlag: boolean, port: number, implicitTlsPort: number): boolean {
  return explicitFlag || port === implicitTlsPort;
}

/**
 * Checks the process arguments for the run-once switch.
 */
export function hasRunOnceFlag(argv: readonly string[] = process.argv): boolean {
  return argv.slice(2).includes('--once');
}
