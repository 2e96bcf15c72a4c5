import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  DEFAULT_FETCH_CHUNK_SIZE,
  DEFAULT_IMAP_FOLDER,
  DEFAULT_IMAP_PORT,
  DEFAULT_IMAP_SSL,
  DEFAULT_IMAP_TIMEOUT_SECONDS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MESSAGE_DELAY_MS,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_RETRY_BACKOFF_MS,
  DEFAULT_SMTP_PORT,
  DEFAULT_SMTP_SSL,
  DEFAULT_SMTP_TIMEOUT_SECONDS,
  DEFAULT_STATE_PATH,
  IMAP_IMPLICIT_TLS_PORT,
  MIN_FETCH_CHUNK_SIZE,
  SMTP_IMPLICIT_TLS_PORT,
} from './config/config.constants';
import {
  hasRunOnceFlag,
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseRequiredString,
  parseStringWithDefault,
  resolveImplicitTls,
} from './config/config.parsers';
import { assertEmailAddress, assertPort, validateTlsConfig } from './config/config.validators';
import type { DestinationConfig, ForwardingConfig, RelayConfiguration, SourceConfig } from './config/config.types';

/**
 * Builds the source mailbox configuration from environment variables.
 *
 * Required environment variables:
 * - SRC_EMAIL: Source account (login name)
 * - SRC_PASSWORD: Source credential
 * - IMAP_HOST: Source host
 *
 * Optional environment variables:
 * - IMAP_PORT: Source port (default: 993)
 * - IMAP_SSL: Explicit TLS flag (default: true); port 993 forces TLS regardless
 * - IMAP_FOLDER: Folder to relay from (default: INBOX)
 * - IMAP_TIMEOUT: Per-operation timeout in seconds (default: 120)
 *
 * @throws {Error} If a required value is missing or malformed
 */
function buildSourceConfig(): SourceConfig {
  const user = parseRequiredString('SRC_EMAIL');
  const port = parseNumberWithDefault(process.env.IMAP_PORT, DEFAULT_IMAP_PORT);
  const sslFlag = parseOptionalBoolean(process.env.IMAP_SSL, DEFAULT_IMAP_SSL);

  assertEmailAddress('SRC_EMAIL', user);
  assertPort('IMAP_PORT', port);
  validateTlsConfig('IMAP', port, sslFlag, IMAP_IMPLICIT_TLS_PORT);

  return {
    user,
    password: parseRequiredString('SRC_PASSWORD'),
    host: parseRequiredString('IMAP_HOST'),
    port,
    secure: resolveImplicitTls(sslFlag, port, IMAP_IMPLICIT_TLS_PORT),
    folder: parseStringWithDefault(process.env.IMAP_FOLDER, DEFAULT_IMAP_FOLDER),
    timeoutMs: parseNumberWithDefault(process.env.IMAP_TIMEOUT, DEFAULT_IMAP_TIMEOUT_SECONDS) * 1000,
  };
}

/**
 * Builds the outbound relay configuration from environment variables.
 *
 * Required environment variables:
 * - SMTP_USER: Relay account, also used as the From address
 * - SMTP_PASSWORD: Relay credential
 * - SMTP_HOST: Relay host
 * - DEST_EMAIL: Address every message is relayed to
 *
 * Optional environment variables:
 * - SMTP_PORT: Relay port (default: 465)
 * - SMTP_SSL: Explicit TLS flag (default: true); port 465 forces TLS regardless
 * - SMTP_TIMEOUT: Per-operation timeout in seconds (default: 120)
 *
 * @throws {Error} If a required value is missing or malformed
 */
function buildDestinationConfig(): DestinationConfig {
  const user = parseRequiredString('SMTP_USER');
  const address = parseRequiredString('DEST_EMAIL');
  const port = parseNumberWithDefault(process.env.SMTP_PORT, DEFAULT_SMTP_PORT);
  const sslFlag = parseOptionalBoolean(process.env.SMTP_SSL, DEFAULT_SMTP_SSL);

  assertEmailAddress('SMTP_USER', user);
  assertEmailAddress('DEST_EMAIL', address);
  assertPort('SMTP_PORT', port);
  validateTlsConfig('SMTP', port, sslFlag, SMTP_IMPLICIT_TLS_PORT);

  return {
    user,
    password: parseRequiredString('SMTP_PASSWORD'),
    host: parseRequiredString('SMTP_HOST'),
    port,
    secure: resolveImplicitTls(sslFlag, port, SMTP_IMPLICIT_TLS_PORT),
    timeoutMs: parseNumberWithDefault(process.env.SMTP_TIMEOUT, DEFAULT_SMTP_TIMEOUT_SECONDS) * 1000,
    address,
  };
}

/**
 * Build Forwarding Configuration
 *
 * Optional environment variables:
 * - RELAY_MAX_ATTEMPTS: Attempts per message, the last one text-only (default: 3)
 * - RELAY_RETRY_BACKOFF_MS: Sleep after a failed attempt (default: 2000)
 * - RELAY_MESSAGE_DELAY_MS: Sleep between messages (default: 3000)
 * - RELAY_FETCH_CHUNK_SIZE: Byte range size for chunked fetches (default: 524288)
 */
function buildForwardingConfig(): ForwardingConfig {
  const maxAttempts = parseNumberWithDefault(process.env.RELAY_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS);
  const fetchChunkSize = parseNumberWithDefault(process.env.RELAY_FETCH_CHUNK_SIZE, DEFAULT_FETCH_CHUNK_SIZE);

  if (maxAttempts < 1) {
    throw new Error(`RELAY_MAX_ATTEMPTS must be at least 1 (got ${maxAttempts})`);
  }

  if (fetchChunkSize < MIN_FETCH_CHUNK_SIZE) {
    throw new Error(`RELAY_FETCH_CHUNK_SIZE must be at least ${MIN_FETCH_CHUNK_SIZE} bytes (got ${fetchChunkSize})`);
  }

  return {
    maxAttempts,
    retryBackoffMs: parseNumberWithDefault(process.env.RELAY_RETRY_BACKOFF_MS, DEFAULT_RETRY_BACKOFF_MS),
    messageDelayMs: parseNumberWithDefault(process.env.RELAY_MESSAGE_DELAY_MS, DEFAULT_MESSAGE_DELAY_MS),
    fetchChunkSize,
  };
}

/**
 * Assembles the complete relay configuration.
 *
 * Exported separately from the registered factory so it can be exercised
 * against a prepared environment.
 */
export function buildRelayConfig(): RelayConfiguration {
  return {
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    source: buildSourceConfig(),
    destination: buildDestinationConfig(),
    forwarding: buildForwardingConfig(),
    schedule: {
      pollIntervalSeconds: parseNumberWithDefault(process.env.POLL_INTERVAL_SECONDS, DEFAULT_POLL_INTERVAL_SECONDS),
      runOnce: hasRunOnceFlag() || parseOptionalBoolean(process.env.RELAY_RUN_ONCE, false),
    },
    progress: {
      statePath: parseStringWithDefault(process.env.RELAY_STATE_PATH, DEFAULT_STATE_PATH),
    },
  };
}

/**
 * Register Config Relay
 */
export default registerAs('relay', buildRelayConfig);
