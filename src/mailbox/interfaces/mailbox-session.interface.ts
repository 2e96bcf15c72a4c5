import type { SourceConfig } from '../../config/config.types';
import type { MailboxClient } from './mailbox-client.interface';

/**
 * An authenticated connection with the relay folder selected.
 *
 * Sessions are never repaired in place: a reconnect yields a new session and
 * the caller drops the old one.
 */
export interface MailboxSession {
  /** Sequence number for log correlation */
  readonly id: number;
  readonly folder: string;
  readonly client: MailboxClient;
}

/**
 * Degraded-mode payload: the header block and one self-contained text entity.
 */
export interface HeaderAndText {
  header: Buffer;
  /** Empty when the message has no text part */
  bodyText: Buffer;
}

export interface MailboxSourceOptions {
  source: SourceConfig;
  fetchChunkSize: number;
}
