import { Logger } from '@nestjs/common';
import { MAX_PORT, MIN_PORT } from './config.constants';

const logger = new Logger('ConfigValidation');

/**
 * Validates e-mail address format.
 *
 * Deliberately loose: one `@`, a non-empty local part, and a dotted domain.
 *
 * @param address - Address to validate
 * @returns True if the address looks deliverable
 */
export function isValidEmailAddress(address: string): boolean {
  return /^[^\s@]+@(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/.test(address);
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 * Throws when a configured address is malformed.
 */
export function assertEmailAddress(name: string, address: string): void {
  if (!isValidEmailAddress(address)) {
    throw new Error(`Invalid e-mail address in ${name}: "${address}"`);
  }
}

export function assertPort(name: string, port: number): void {
  if (!isValidPort(port)) {
    throw new Error(`Invalid port in ${name}: ${port} (must be between ${MIN_PORT} and ${MAX_PORT})`);
  }
}

/**
 * Validates TLS configuration for common misconfigurations.
 *
 * Logs a warning when implicit TLS is switched off on the protocol's
 * implicit-TLS port, because the port forces TLS anyway.
 */
export function validateTlsConfig(
  protocol: 'IMAP' | 'SMTP',
  port: number,
  explicitFlag: boolean,
  implicitTlsPort: number,
): void {
  if (!explicitFlag && port === implicitTlsPort) {
    logger.warn(
      `${protocol}_SSL=false is ignored on port ${port}; ` +
        `${port} is the conventional implicit-TLS port for ${protocol}, so TLS stays enabled.`,
    );
  }
}
