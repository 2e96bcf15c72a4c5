import type { SourceConfig } from '../../config/config.types';

/**
 * One node of a message's MIME tree as reported by the server's BODYSTRUCTURE.
 */
export interface MessageOutline {
  /** Section number (`1`, `1.2`, ...); absent on the root of a multipart message */
  part?: string;
  /** Lower-cased `type/subtype` */
  type: string;
  disposition?: string;
  childNodes?: MessageOutline[];
}

/**
 * Items to request in a single FETCH.
 */
export interface MailboxFetchQuery {
  /** RFC822.SIZE */
  size?: boolean;
  /** Whole message, or a byte range of it */
  source?: boolean | { start: number; maxLength: number };
  /** Header block */
  headers?: boolean;
  bodyStructure?: boolean;
  /** Section specifiers such as `TEXT`, `1.MIME`, `2` */
  bodyParts?: string[];
}

export interface MailboxFetchResult {
  size?: number;
  source?: Buffer;
  headers?: Buffer;
  bodyStructure?: MessageOutline;
  bodyParts?: Map<string, Buffer>;
}

/**
 * Transport primitives of a stateful mailbox connection.
 *
 * Implementations are expected to be correct but not reliable: any call may
 * reject when the connection drops.
 */
export interface MailboxClient {
  /** False once the connection is known to be closed */
  readonly usable: boolean;
  connect(): Promise<void>;
  openFolder(path: string): Promise<void>;
  noop(): Promise<void>;
  /** UIDs with the \Seen flag unset, in server order */
  searchUnseen(): Promise<number[]>;
  /** Undefined when the UID no longer exists */
  fetchOne(uid: number, query: MailboxFetchQuery): Promise<MailboxFetchResult | undefined>;
  addFlags(uid: number, flags: string[]): Promise<void>;
  logout(): Promise<void>;
}

export type MailboxClientFactory = (config: SourceConfig) => MailboxClient;
