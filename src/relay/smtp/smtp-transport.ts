import { createTransport } from 'nodemailer';
import type SMTPPool from 'nodemailer/lib/smtp-pool';
import type { DestinationConfig } from '../../config/config.types';
import type { RelayTransport } from '../interfaces/relay-transport.interface';

/**
 * Pooled SMTP transport holding a single connection, opened on the first send
 * and reused until `close()`. `verify()` authenticates on a separate short-lived
 * connection.
 *
 * Without implicit TLS the server must offer STARTTLS.
 */
export function createSmtpRelayTransport(config: DestinationConfig): RelayTransport {
  const options: SMTPPool.Options = {
    pool: true,
    maxConnections: 1,
    host: config.host,
    port: config.port,
    secure: config.secure,
    requireTLS: !config.secure,
    auth: { user: config.user, pass: config.password },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  };

  return createTransport(options);
}
