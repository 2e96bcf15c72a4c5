/**
 * How much of the original message survives relaying.
 */
export enum Fidelity {
  /** Body plus every named attachment */
  FULL = 'full',
  /** Body text only; attachments dropped with a visible notice */
  DEGRADED = 'degraded',
}

export interface ComposedAttachment {
  filename: string;
  /** Never empty; `application/octet-stream` when the source gave none */
  contentType: string;
  content: Buffer;
}

interface ComposedMessageBase {
  /** `[forwarded] ` + decoded original subject */
  subject: string;
  originalSubject: string;
  /** Decoded original From, e.g. `Alice <alice@example.com>` */
  originalSender: string;
  /** Exactly one of `html` and `text` is set */
  html?: string;
  text?: string;
}

export interface FullComposedMessage extends ComposedMessageBase {
  fidelity: Fidelity.FULL;
  attachments: ComposedAttachment[];
}

export interface DegradedComposedMessage extends ComposedMessageBase {
  fidelity: Fidelity.DEGRADED;
  attachments: [];
}

/**
 * Outbound artifact built once per attempt and consumed once by the relay.
 */
export type ComposedMessage = FullComposedMessage | DegradedComposedMessage;
