import { Logger } from '@nestjs/common';
import type { RelayConfiguration } from './config.types';

/**
 * Masks the local part of an address for log output.
 *
 * @example
 * ```
 * redactAddress('alice@example.com') // 'a***@example.com'
 * ```
 */
export function redactAddress(address: string): string {
  const at = address.indexOf('@');
  if (at <= 0) {
    return '***';
  }
  return `${address[0]}***${address.slice(at)}`;
}

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration. Credentials are never printed
 * and account names are redacted.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: RelayConfiguration): void {
  const summaryLogger = new Logger('Configuration');
  const { source, destination, forwarding, schedule } = config;

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(
    `Source: ${redactAddress(source.user)} @ ${source.host}:${source.port}/${source.folder} (tls: ${source.secure})`,
  );
  summaryLogger.log(
    `Relay: ${redactAddress(destination.user)} @ ${destination.host}:${destination.port} (tls: ${destination.secure})`,
  );
  summaryLogger.log(`Destination: ${redactAddress(destination.address)}`);
  summaryLogger.log(
    `Forwarding: ${forwarding.maxAttempts} attempt(s), backoff ${forwarding.retryBackoffMs}ms, ` +
      `delay ${forwarding.messageDelayMs}ms, chunk ${forwarding.fetchChunkSize} bytes`,
  );
  summaryLogger.log(
    schedule.runOnce ? 'Mode: run once' : `Mode: run forever (poll interval ${schedule.pollIntervalSeconds}s)`,
  );
  summaryLogger.log(`State file: ${config.progress.statePath}`);
}
/* c8 ignore stop */
