import type { SendMailOptions } from 'nodemailer';
import type { DestinationConfig } from '../../config/config.types';

export interface RelaySendInfo {
  messageId: string;
  response?: string;
}

/**
 * The part of a nodemailer transporter the relay relies on.
 */
export interface RelayTransport {
  /** Connects and authenticates; rejects when the server refuses */
  verify(): Promise<unknown>;
  sendMail(mail: SendMailOptions): Promise<RelaySendInfo>;
  close(): void;
}

export type RelayTransportFactory = (config: DestinationConfig) => RelayTransport;

/**
 * A verified outbound connection, reused for every send of one cycle.
 */
export interface RelaySession {
  readonly id: number;
  readonly transport: RelayTransport;
}
