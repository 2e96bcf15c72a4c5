import { Logger } from '@nestjs/common';
import { ImapFlow } from 'imapflow';
import type { FetchQueryObject, MessageStructureObject } from 'imapflow';
import type { SourceConfig } from '../../config/config.types';
import type {
  MailboxClient,
  MailboxFetchQuery,
  MailboxFetchResult,
  MessageOutline,
} from '../interfaces/mailbox-client.interface';

function toOutline(node: MessageStructureObject): MessageOutline {
  return {
    part: node.part,
    type: node.type.toLowerCase(),
    disposition: node.disposition,
    childNodes: node.childNodes?.map(toOutline),
  };
}

function toFetchQuery(query: MailboxFetchQuery): FetchQueryObject {
  return {
    size: query.size,
    source: query.source,
    headers: query.headers,
    bodyStructure: query.bodyStructure,
    bodyParts: query.bodyParts,
  };
}

/**
 * {@link MailboxClient} backed by imapflow. Every command addresses messages
 * by UID and every body fetch uses BODY.PEEK, so reading never sets \Seen.
 */
export class ImapMailboxClient implements MailboxClient {
  private readonly logger = new Logger(ImapMailboxClient.name);
  private readonly client: ImapFlow;

  constructor(config: SourceConfig) {
    this.client = new ImapFlow({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: { user: config.user, pass: config.password },
      logger: false,
      connectionTimeout: config.timeoutMs,
      greetingTimeout: config.timeoutMs,
      socketTimeout: config.timeoutMs,
    });

    // imapflow reports socket failures as 'error' events; an unhandled one would end the process
    this.client.on('error', (error: Error) => {
      this.logger.warn(`IMAP connection error (${config.host}): ${error.message}`);
    });
  }

  get usable(): boolean {
    return this.client.usable;
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async openFolder(path: string): Promise<void> {
    await this.client.mailboxOpen(path, { readOnly: false });
  }

  async noop(): Promise<void> {
    await this.client.noop();
  }

  async searchUnseen(): Promise<number[]> {
    const uids: unknown = await this.client.search({ seen: false }, { uid: true });
    return Array.isArray(uids) ? uids.filter((uid): uid is number => typeof uid === 'number') : [];
  }

  async fetchOne(uid: number, query: MailboxFetchQuery): Promise<MailboxFetchResult | undefined> {
    const message = await this.client.fetchOne(String(uid), toFetchQuery(query), { uid: true });
    if (!message) {
      return undefined;
    }

    return {
      size: message.size,
      source: message.source,
      headers: message.headers,
      bodyStructure: message.bodyStructure ? toOutline(message.bodyStructure) : undefined,
      bodyParts: message.bodyParts,
    };
  }

  async addFlags(uid: number, flags: string[]): Promise<void> {
    await this.client.messageFlagsAdd(String(uid), flags, { uid: true });
  }

  async logout(): Promise<void> {
    await this.client.logout();
  }
}

export function createImapMailboxClient(config: SourceConfig): MailboxClient {
  return new ImapMailboxClient(config);
}
