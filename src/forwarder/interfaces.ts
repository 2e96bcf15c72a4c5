import type { Fidelity } from '../composer/interfaces/composed-message.interface';
import type { ForwardingConfig } from '../config/config.types';
import type { MailboxSession } from '../mailbox/interfaces/mailbox-session.interface';
import type { ProgressKey } from '../progress/interfaces';
import type { RelaySession } from '../relay/interfaces/relay-transport.interface';
import type { RelayError } from '../shared/errors';

export interface ForwarderOptions extends ForwardingConfig {
  progressKey: ProgressKey;
}

/**
 * Result of one attempt at relaying a candidate.
 */
export type AttemptOutcome = { ok: true; fidelity: Fidelity } | { ok: false; error: RelayError };

/**
 * Terminal state of a candidate.
 */
export type Resolution = { status: 'forwarded'; fidelity: Fidelity; attempts: number } | { status: 'skipped' };

export interface CycleReport {
  candidates: number;
  forwarded: number;
  degraded: number;
  skipped: number;
  /** Watermark after the cycle; undefined when nothing has ever been resolved */
  watermark?: number;
  /** True when a shutdown request ended the cycle before every candidate was resolved */
  interrupted: boolean;
}

/**
 * Live sessions owned by one cycle. Reconnects replace the session objects;
 * the pending flags carry a forced reconnect into the next attempt.
 */
export interface CycleSessions {
  mailbox: MailboxSession;
  relay?: RelaySession;
  reconnectMailbox: boolean;
  reconnectRelay: boolean;
}
