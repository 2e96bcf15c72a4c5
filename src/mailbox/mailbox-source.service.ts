import { Inject, Injectable, Logger } from '@nestjs/common';
import { withTimeout } from '../shared/async.utils';
import { getErrorMessage } from '../shared/error.utils';
import { ConnectionError, isRelayError, ProtocolError } from '../shared/errors';
import type { RelayError } from '../shared/errors';
import type {
  MailboxClient,
  MailboxClientFactory,
  MailboxFetchQuery,
  MailboxFetchResult,
} from './interfaces/mailbox-client.interface';
import type { HeaderAndText, MailboxSession, MailboxSourceOptions } from './interfaces/mailbox-session.interface';
import { MAILBOX_CLIENT_FACTORY, MAILBOX_SOURCE_OPTIONS } from './mailbox.tokens';
import { planByteRanges } from './utils/byte-ranges';
import { findBodyPart, isMultipart, isTextType, selectTextPart } from './utils/text-part.utils';

const SEEN_FLAG = '\\Seen';

/**
 * Read side of the relay: lists, fetches and flags messages in the source folder.
 *
 * Failures surface as typed errors:
 * - `ConnectionError` when a session cannot be established
 * - `ProtocolError` when a live session fails or rejects a command
 *
 * Every network call carries the configured source timeout.
 */
@Injectable()
export class MailboxSourceService {
  private readonly logger = new Logger(MailboxSourceService.name);
  private sessionCounter = 0;

  constructor(
    @Inject(MAILBOX_CLIENT_FACTORY) private readonly clientFactory: MailboxClientFactory,
    @Inject(MAILBOX_SOURCE_OPTIONS) private readonly options: MailboxSourceOptions,
  ) {}

  /**
   * Opens a fresh authenticated session with the relay folder selected.
   * The caller discards any previous session.
   *
   * @throws {ConnectionError} If connecting, authenticating or selecting fails
   */
  async connect(): Promise<MailboxSession> {
    const { host, port, folder } = this.options.source;
    const client = this.clientFactory(this.options.source);

    try {
      await this.timed(client.connect(), 'IMAP connect');
      await this.timed(client.openFolder(folder), `IMAP select ${folder}`);
    } catch (error) {
      await this.logoutQuietly(client);
      throw new ConnectionError('mailbox', `Mailbox connection to ${host}:${port} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    this.sessionCounter += 1;
    this.logger.log(`Mailbox session #${this.sessionCounter} opened (${host}:${port}/${folder})`);
    return { id: this.sessionCounter, folder, client };
  }

  /**
   * Cheap liveness check run before every fetch.
   * @returns False when the session must be replaced
   */
  async probe(session: MailboxSession): Promise<boolean> {
    if (!session.client.usable) {
      return false;
    }

    try {
      await this.timed(session.client.noop(), 'IMAP NOOP');
      return true;
    } catch (error) {
      this.logger.debug(`Mailbox session #${session.id} failed health probe: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Lists unseen UIDs in server order, without duplicates.
   *
   * @throws {ProtocolError} If the search command fails
   */
  async listUnseen(session: MailboxSession): Promise<number[]> {
    try {
      const uids = await this.timed(session.client.searchUnseen(), 'IMAP SEARCH UNSEEN');
      return [...new Set(uids)];
    } catch (error) {
      throw this.asProtocolError(error, `Listing unseen messages in ${session.folder} failed`);
    }
  }

  /**
   * Retrieves the complete message as sequential byte ranges.
   *
   * The size comes from RFC822.SIZE. When the server does not report it the
   * message is fetched in one unbounded request, which brings back the risk
   * that an oversized reply drops the connection.
   *
   * @throws {ProtocolError} If any request fails or returns no bytes
   */
  async fetchFull(session: MailboxSession, uid: number): Promise<Buffer> {
    const { client } = session;

    try {
      const metadata = await this.fetchOne(client, uid, { size: true }, 'RFC822.SIZE');
      const size = metadata.size;

      if (size === undefined || size <= 0) {
        this.logger.warn(`Size of UID ${uid} unavailable; falling back to a single unbounded fetch`);
        const whole = await this.fetchOne(client, uid, { source: true }, 'BODY[]');
        if (!whole.source || whole.source.length === 0) {
          throw new ProtocolError(`FETCH returned no message bytes for UID ${uid}`);
        }
        return whole.source;
      }

      const chunks: Buffer[] = [];
      let received = 0;

      for (const range of planByteRanges(size, this.options.fetchChunkSize)) {
        const chunk = await this.fetchOne(
          client,
          uid,
          { source: { start: range.start, maxLength: range.length } },
          `BODY[]<${range.start}.${range.length}>`,
        );

        if (!chunk.source || chunk.source.length === 0) {
          throw new ProtocolError(`FETCH returned an empty chunk at offset ${range.start} for UID ${uid}`);
        }

        chunks.push(chunk.source);
        received += chunk.source.length;
      }

      if (received < size) {
        throw new ProtocolError(`Short read for UID ${uid}: ${received} of ${size} bytes`);
      }

      this.logger.debug(`Fetched UID ${uid}: ${size} bytes in ${chunks.length} chunk(s)`);
      const raw = Buffer.concat(chunks);
      return raw.length > size ? raw.subarray(0, size) : raw;
    } catch (error) {
      throw this.asProtocolError(error, `Fetching UID ${uid} failed`);
    }
  }

  /**
   * Retrieves only the header block and the preferred text part.
   *
   * A multipart message yields the chosen part as a self-contained MIME entity
   * (its MIME header followed by its content). A single-part text message
   * yields the whole message. No body request is ever chunked.
   *
   * @throws {ProtocolError} If a request fails or the header block is missing
   */
  async fetchHeaderAndText(session: MailboxSession, uid: number): Promise<HeaderAndText> {
    const { client } = session;

    try {
      const outline = await this.fetchOne(client, uid, { headers: true, bodyStructure: true }, 'HEADER BODYSTRUCTURE');
      const header = outline.headers;
      if (!header || header.length === 0) {
        throw new ProtocolError(`FETCH returned no header block for UID ${uid}`);
      }

      const structure = outline.bodyStructure;
      if (!structure) {
        return { header, bodyText: Buffer.alloc(0) };
      }

      if (!isMultipart(structure)) {
        if (!isTextType(structure.type)) {
          return { header, bodyText: Buffer.alloc(0) };
        }
        const text = await this.fetchSections(client, uid, ['TEXT']);
        return { header, bodyText: Buffer.concat([header, text[0]]) };
      }

      const part = selectTextPart(structure);
      if (!part) {
        return { header, bodyText: Buffer.alloc(0) };
      }

      const [mimeHeader, content] = await this.fetchSections(client, uid, [`${part}.MIME`, part]);
      return { header, bodyText: Buffer.concat([mimeHeader, content]) };
    } catch (error) {
      throw this.asProtocolError(error, `Fetching header and text of UID ${uid} failed`);
    }
  }

  /**
   * Sets \Seen. Only called once the message has been relayed.
   *
   * @throws {ProtocolError} If the flag update fails
   */
  async markResolved(session: MailboxSession, uid: number): Promise<void> {
    try {
      await this.timed(session.client.addFlags(uid, [SEEN_FLAG]), `IMAP STORE ${uid} +FLAGS`);
    } catch (error) {
      throw this.asProtocolError(error, `Marking UID ${uid} as seen failed`);
    }
  }

  /**
   * Best-effort logout. Never throws.
   */
  async disconnect(session: MailboxSession): Promise<void> {
    await this.logoutQuietly(session.client);
    this.logger.debug(`Mailbox session #${session.id} closed`);
  }

  private async fetchOne(
    client: MailboxClient,
    uid: number,
    query: MailboxFetchQuery,
    label: string,
  ): Promise<MailboxFetchResult> {
    const result = await this.timed(client.fetchOne(uid, query), `IMAP FETCH ${uid} ${label}`);
    if (!result) {
      throw new ProtocolError(`UID ${uid} no longer exists`);
    }
    return result;
  }

  private async fetchSections(client: MailboxClient, uid: number, sections: string[]): Promise<Buffer[]> {
    const result = await this.fetchOne(client, uid, { bodyParts: sections }, sections.join(' '));

    return sections.map((section) => {
      const content = findBodyPart(result.bodyParts, section);
      if (!content) {
        throw new ProtocolError(`FETCH returned no section ${section} for UID ${uid}`);
      }
      return content;
    });
  }

  private timed<T>(operation: Promise<T>, label: string): Promise<T> {
    return withTimeout(operation, this.options.source.timeoutMs, label);
  }

  private asProtocolError(error: unknown, context: string): RelayError {
    if (isRelayError(error)) {
      return error;
    }
    return new ProtocolError(`${context}: ${getErrorMessage(error)}`, { cause: error });
  }

  private async logoutQuietly(client: MailboxClient): Promise<void> {
    try {
      await this.timed(client.logout(), 'IMAP LOGOUT');
    } catch (error) {
      this.logger.debug(`Ignoring mailbox logout failure: ${getErrorMessage(error)}`);
    }
  }
}
