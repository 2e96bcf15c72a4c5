import type {
  MailboxClient,
  MailboxClientFactory,
  MailboxFetchQuery,
  MailboxFetchResult,
  MessageOutline,
} from '../../src/mailbox/interfaces/mailbox-client.interface';
import type { BuiltEmailFixture } from './test-emails';

export type FakeMailboxOperation =
  | 'connect'
  | 'openFolder'
  | 'noop'
  | 'searchUnseen'
  | 'fetchSize'
  | 'fetchSource'
  | 'fetchOutline'
  | 'fetchSections'
  | 'addFlags'
  | 'logout';

export interface FailureOptions {
  error?: Error;
  /** How many matching calls fail; defaults to 1 */
  times?: number;
  /** Marks the failing client unusable, as a dropped socket would */
  dropConnection?: boolean;
  /** Restricts the failure to calls addressing this UID */
  uid?: number;
}

export interface StoredMessageOptions {
  seen?: boolean;
  /** When false the server omits RFC822.SIZE */
  reportSize?: boolean;
  /** Serve every byte range as an empty buffer */
  emptyRanges?: boolean;
}

export interface FetchLogEntry {
  clientId: number;
  uid: number;
  operation: FakeMailboxOperation;
  query: MailboxFetchQuery;
}

interface StoredMessage {
  uid: number;
  raw: Buffer;
  header: Buffer;
  structure: MessageOutline;
  sections: Record<string, Buffer>;
  flags: Set<string>;
  reportSize: boolean;
  emptyRanges: boolean;
}

interface ScriptedFailure {
  operation: FakeMailboxOperation;
  error: Error;
  remaining: number;
  dropConnection: boolean;
  uid?: number;
}

/**
 * In-process stand-in for an IMAP server folder. Every client the factory
 * hands out shares the same messages, flags and failure script.
 */
export class FakeMailbox {
  readonly clients: FakeMailboxClient[] = [];
  readonly fetchLog: FetchLogEntry[] = [];
  private readonly messages = new Map<number, StoredMessage>();
  private readonly failures: ScriptedFailure[] = [];

  readonly factory: MailboxClientFactory = () => {
    const client = new FakeMailboxClient(this, this.clients.length + 1);
    this.clients.push(client);
    return client;
  };

  addMessage(uid: number, fixture: BuiltEmailFixture, options: StoredMessageOptions = {}): this {
    this.messages.set(uid, {
      uid,
      raw: fixture.raw,
      header: fixture.header,
      structure: fixture.structure,
      sections: fixture.sections,
      flags: new Set(options.seen ? ['\\Seen'] : []),
      reportSize: options.reportSize ?? true,
      emptyRanges: options.emptyRanges ?? false,
    });
    return this;
  }

  failOn(operation: FakeMailboxOperation, options: FailureOptions = {}): this {
    this.failures.push({
      operation,
      error: options.error ?? new Error(`Simulated ${operation} failure`),
      remaining: options.times ?? 1,
      dropConnection: options.dropConnection ?? false,
      uid: options.uid,
    });
    return this;
  }

  isSeen(uid: number): boolean {
    return this.messages.get(uid)?.flags.has('\\Seen') ?? false;
  }

  fetchesFor(uid: number, operation?: FakeMailboxOperation): FetchLogEntry[] {
    return this.fetchLog.filter(
      (entry) => entry.uid === uid && (operation === undefined || entry.operation === operation),
    );
  }

  get connectCount(): number {
    return this.clients.length;
  }

  getMessage(uid: number): StoredMessage | undefined {
    return this.messages.get(uid);
  }

  listUnseen(): number[] {
    return [...this.messages.values()].filter((message) => !message.flags.has('\\Seen')).map((m) => m.uid);
  }

  takeFailure(operation: FakeMailboxOperation, uid?: number): ScriptedFailure | undefined {
    const failure = this.failures.find(
      (candidate) =>
        candidate.operation === operation &&
        candidate.remaining > 0 &&
        (candidate.uid === undefined || candidate.uid === uid),
    );
    if (failure) {
      failure.remaining -= 1;
    }
    return failure;
  }
}

export class FakeMailboxClient implements MailboxClient {
  private connected = false;
  private dropped = false;
  private selectedFolder?: string;

  constructor(
    private readonly mailbox: FakeMailbox,
    readonly id: number,
  ) {}

  get usable(): boolean {
    return this.connected && !this.dropped;
  }

  get folder(): string | undefined {
    return this.selectedFolder;
  }

  async connect(): Promise<void> {
    this.applyFailure('connect');
    this.connected = true;
  }

  async openFolder(path: string): Promise<void> {
    this.ensureUsable();
    this.applyFailure('openFolder');
    this.selectedFolder = path;
  }

  async noop(): Promise<void> {
    this.ensureUsable();
    this.applyFailure('noop');
  }

  async searchUnseen(): Promise<number[]> {
    this.ensureUsable();
    this.applyFailure('searchUnseen');
    return this.mailbox.listUnseen();
  }

  async fetchOne(uid: number, query: MailboxFetchQuery): Promise<MailboxFetchResult | undefined> {
    const operation = classifyFetch(query);
    this.mailbox.fetchLog.push({ clientId: this.id, uid, operation, query });
    this.ensureUsable();
    this.applyFailure(operation, uid);

    const message = this.mailbox.getMessage(uid);
    if (!message) {
      return undefined;
    }

    const result: MailboxFetchResult = {};
    if (query.size && message.reportSize) {
      result.size = message.raw.length;
    }
    if (query.source === true) {
      result.source = message.raw;
    } else if (query.source) {
      const { start, maxLength } = query.source;
      result.source = message.emptyRanges ? Buffer.alloc(0) : message.raw.subarray(start, start + maxLength);
    }
    if (query.headers) {
      result.headers = message.header;
    }
    if (query.bodyStructure) {
      result.bodyStructure = message.structure;
    }
    if (query.bodyParts) {
      result.bodyParts = new Map();
      for (const section of query.bodyParts) {
        const content = section === 'TEXT' ? message.raw.subarray(message.header.length) : message.sections[section];
        if (content) {
          // servers answer with lower-cased section names
          result.bodyParts.set(section.toLowerCase(), content);
        }
      }
    }
    return result;
  }

  async addFlags(uid: number, flags: string[]): Promise<void> {
    this.ensureUsable();
    this.applyFailure('addFlags', uid);
    const message = this.mailbox.getMessage(uid);
    flags.forEach((flag) => message?.flags.add(flag));
  }

  async logout(): Promise<void> {
    this.applyFailure('logout');
    this.connected = false;
  }

  private ensureUsable(): void {
    if (!this.usable) {
      throw Object.assign(new Error('Connection not available'), { code: 'NoConnection' });
    }
  }

  private applyFailure(operation: FakeMailboxOperation, uid?: number): void {
    const failure = this.mailbox.takeFailure(operation, uid);
    if (!failure) {
      return;
    }
    if (failure.dropConnection) {
      this.dropped = true;
    }
    throw failure.error;
  }
}

function classifyFetch(query: MailboxFetchQuery): FakeMailboxOperation {
  if (query.size) {
    return 'fetchSize';
  }
  if (query.source) {
    return 'fetchSource';
  }
  if (query.headers || query.bodyStructure) {
    return 'fetchOutline';
  }
  return 'fetchSections';
}
