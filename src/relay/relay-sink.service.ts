import { Inject, Injectable, Logger } from '@nestjs/common';
import type { SendMailOptions } from 'nodemailer';
import type { DestinationConfig } from '../config/config.types';
import type { ComposedMessage } from '../composer/interfaces/composed-message.interface';
import { withTimeout } from '../shared/async.utils';
import { getErrorCode, getErrorMessage, getResponseCode } from '../shared/error.utils';
import { ConnectionError, DeliveryError, OperationTimeoutError } from '../shared/errors';
import type { RelayError } from '../shared/errors';
import type { RelaySession, RelayTransport, RelayTransportFactory } from './interfaces/relay-transport.interface';
import { CONNECTION_ERROR_CODES } from './relay.constants';
import { RELAY_DESTINATION_CONFIG, RELAY_TRANSPORT_FACTORY } from './relay.tokens';

/**
 * Write side of the relay: delivers composed messages to the fixed destination.
 */
@Injectable()
export class RelaySinkService {
  private readonly logger = new Logger(RelaySinkService.name);
  private sessionCounter = 0;

  constructor(
    @Inject(RELAY_TRANSPORT_FACTORY) private readonly transportFactory: RelayTransportFactory,
    @Inject(RELAY_DESTINATION_CONFIG) private readonly config: DestinationConfig,
  ) {}

  /**
   * Creates a transport and authenticates against the server.
   *
   * @throws {ConnectionError} If the server is unreachable or refuses the login
   */
  async connect(): Promise<RelaySession> {
    const { host, port } = this.config;
    const transport = this.transportFactory(this.config);

    try {
      await withTimeout(transport.verify(), this.config.timeoutMs, 'SMTP verify');
    } catch (error) {
      this.closeQuietly(transport);
      throw new ConnectionError('relay', `Relay connection to ${host}:${port} failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    this.sessionCounter += 1;
    this.logger.log(`Relay session #${this.sessionCounter} opened (${host}:${port})`);
    return { id: this.sessionCounter, transport };
  }

  /**
   * Sends one message from the relay account to the destination address.
   * The message id assigned by the transport is logged at debug level.
   *
   * @throws {ConnectionError} On socket failures and timeouts
   * @throws {DeliveryError} When the server refuses the message
   */
  async send(session: RelaySession, message: ComposedMessage): Promise<void> {
    const mail: SendMailOptions = {
      from: this.config.user,
      to: this.config.address,
      subject: message.subject,
      html: message.html,
      text: message.text,
      attachments: message.attachments.map((attachment) => ({
        filename: attachment.filename,
        contentType: attachment.contentType,
        content: attachment.content,
      })),
    };

    try {
      const info = await withTimeout(session.transport.sendMail(mail), this.config.timeoutMs, 'SMTP send');
      this.logger.debug(`Relay accepted "${message.subject}" as ${info.messageId}`);
    } catch (error) {
      throw this.classifySendError(error);
    }
  }

  /**
   * Best-effort close. Never throws.
   */
  disconnect(session: RelaySession): void {
    this.closeQuietly(session.transport);
    this.logger.debug(`Relay session #${session.id} closed`);
  }

  private classifySendError(error: unknown): RelayError {
    const message = getErrorMessage(error);
    const code = getErrorCode(error);

    if (error instanceof OperationTimeoutError || (code !== undefined && CONNECTION_ERROR_CODES.has(code))) {
      return new ConnectionError('relay', `Relay connection lost while sending: ${message}`, { cause: error });
    }

    const responseCode = getResponseCode(error);
    const reply = responseCode !== undefined ? ` (${responseCode})` : '';
    return new DeliveryError(`Relay refused the message${reply}: ${message}`, responseCode, { cause: error });
  }

  private closeQuietly(transport: RelayTransport): void {
    try {
      transport.close();
    } catch (error) {
      this.logger.debug(`Ignoring relay close failure: ${getErrorMessage(error)}`);
    }
  }
}
