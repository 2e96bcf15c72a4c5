import { Inject, Injectable, Logger } from '@nestjs/common';
import { MessageComposerService } from '../composer/message-composer.service';
import { Fidelity } from '../composer/interfaces/composed-message.interface';
import type { ComposedMessage } from '../composer/interfaces/composed-message.interface';
import { MailboxSourceService } from '../mailbox/mailbox-source.service';
import type { MailboxSession } from '../mailbox/interfaces/mailbox-session.interface';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { MetricsService } from '../metrics/metrics.service';
import { ProgressStoreService } from '../progress/progress-store.service';
import { RelaySinkService } from '../relay/relay-sink.service';
import type { RelaySession } from '../relay/interfaces/relay-transport.interface';
import type { Sleep } from '../shared/async.utils';
import { getErrorMessage } from '../shared/error.utils';
import { ConnectionError, DeliveryError, isRelayError } from '../shared/errors';
import type { RelayError } from '../shared/errors';
import { SLEEP } from '../shared/shared.tokens';
import { FORWARDER_OPTIONS } from './forwarder.tokens';
import type { AttemptOutcome, CycleReport, CycleSessions, ForwarderOptions, Resolution } from './interfaces';

/**
 * Runs forwarding cycles: lists unseen messages and resolves each one, in
 * listing order, as forwarded or skipped.
 *
 * Every candidate gets up to `maxAttempts` attempts. All but the last fetch
 * and relay the complete message; the last one relays only the header and the
 * text part. Whatever the outcome, the watermark moves past the candidate
 * before the next one starts.
 */
@Injectable()
export class ForwarderService {
  private readonly logger = new Logger(ForwarderService.name);

  constructor(
    private readonly mailboxSource: MailboxSourceService,
    private readonly relaySink: RelaySinkService,
    private readonly composer: MessageComposerService,
    private readonly progressStore: ProgressStoreService,
    private readonly metricsService: MetricsService,
    @Inject(FORWARDER_OPTIONS) private readonly options: ForwarderOptions,
    @Inject(SLEEP) private readonly sleep: Sleep,
  ) {}

  /**
   * Runs one cycle. A shutdown signal is honoured between candidates.
   *
   * @throws {RelayError} When the cycle cannot start (initial connect or listing)
   */
  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const { progressKey } = this.options;
    const report: CycleReport = {
      candidates: 0,
      forwarded: 0,
      degraded: 0,
      skipped: 0,
      watermark: this.progressStore.getWatermark(progressKey),
      interrupted: false,
    };

    this.logger.log(`Starting cycle for ${progressKey.folder} (watermark ${report.watermark ?? 'none'})`);

    const sessions: CycleSessions = {
      mailbox: await this.mailboxSource.connect(),
      reconnectMailbox: false,
      reconnectRelay: false,
    };

    try {
      const candidates = await this.mailboxSource.listUnseen(sessions.mailbox);
      report.candidates = candidates.length;

      if (candidates.length === 0) {
        this.logger.log('No unseen messages');
        return report;
      }

      this.logger.log(`Found ${candidates.length} unseen message(s)`);
      sessions.relay = await this.relaySink.connect();

      for (const [index, uid] of candidates.entries()) {
        if (signal?.aborted) {
          report.interrupted = true;
          this.logger.log(`Shutdown requested; leaving ${candidates.length - index} candidate(s) for the next cycle`);
          break;
        }

        const resolution = await this.resolveCandidate(sessions, uid);
        report.watermark = this.progressStore.advance(progressKey, uid);

        if (resolution.status === 'forwarded') {
          report.forwarded += 1;
          this.metricsService.increment(METRIC_PATHS.MESSAGES_FORWARDED_TOTAL);
          if (resolution.fidelity === Fidelity.DEGRADED) {
            report.degraded += 1;
            this.metricsService.increment(METRIC_PATHS.MESSAGES_DEGRADED_TOTAL);
          }
        } else {
          report.skipped += 1;
          this.metricsService.increment(METRIC_PATHS.MESSAGES_SKIPPED_TOTAL);
        }

        await this.sleep(this.options.messageDelayMs, signal);
      }

      this.logger.log(
        `Cycle finished: ${report.forwarded} forwarded (${report.degraded} degraded), ${report.skipped} skipped`,
      );
      return report;
    } finally {
      await this.closeSessions(sessions);
    }
  }

  private async resolveCandidate(sessions: CycleSessions, uid: number): Promise<Resolution> {
    const { maxAttempts } = this.options;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const fidelity = attempt < maxAttempts ? Fidelity.FULL : Fidelity.DEGRADED;
      const outcome = await this.attempt(sessions, uid, fidelity);

      if (outcome.ok) {
        this.logger.log(`Forwarded UID ${uid} on attempt ${attempt}/${maxAttempts} (${fidelity})`);
        await this.markResolved(sessions, uid);
        return { status: 'forwarded', fidelity, attempts: attempt };
      }

      const { error } = outcome;
      this.logger.warn(
        `UID ${uid} attempt ${attempt}/${maxAttempts} (${fidelity}) failed with ${error.name}: ${error.message}`,
      );
      this.metricsService.increment(METRIC_PATHS.ATTEMPTS_FAILED_TOTAL);
      this.scheduleReconnect(sessions, error);
      await this.sleep(this.options.retryBackoffMs);
    }

    this.logger.error(`Skipped UID ${uid} after ${maxAttempts} failed attempts`);
    return { status: 'skipped' };
  }

  private async attempt(sessions: CycleSessions, uid: number, fidelity: Fidelity): Promise<AttemptOutcome> {
    try {
      const { mailbox, relay } = await this.prepareSessions(sessions);
      const message = await this.fetchAndCompose(mailbox, uid, fidelity);
      await this.relaySink.send(relay, message);
      return { ok: true, fidelity };
    } catch (error) {
      if (!isRelayError(error)) {
        throw error;
      }
      return { ok: false, error };
    }
  }

  private async fetchAndCompose(mailbox: MailboxSession, uid: number, fidelity: Fidelity): Promise<ComposedMessage> {
    if (fidelity === Fidelity.FULL) {
      const raw = await this.mailboxSource.fetchFull(mailbox, uid);
      return this.composer.composeFull(raw);
    }

    const { header, bodyText } = await this.mailboxSource.fetchHeaderAndText(mailbox, uid);
    return this.composer.composeDegraded(header, bodyText);
  }

  /**
   * Applies forced reconnects, then probes the mailbox so a stale session is
   * never used for a fetch.
   */
  private async prepareSessions(
    sessions: CycleSessions,
  ): Promise<{ mailbox: MailboxSession; relay: RelaySession }> {
    if (sessions.reconnectMailbox || !(await this.mailboxSource.probe(sessions.mailbox))) {
      const previous = sessions.mailbox;
      this.logger.log(`Reconnecting mailbox session #${previous.id}`);
      await this.mailboxSource.disconnect(previous);
      sessions.mailbox = await this.mailboxSource.connect();
      sessions.reconnectMailbox = false;
      this.metricsService.increment(METRIC_PATHS.SESSIONS_RECONNECTS_TOTAL);
    }

    if (sessions.reconnectRelay || !sessions.relay) {
      if (sessions.relay) {
        this.logger.log(`Reconnecting relay session #${sessions.relay.id}`);
        this.relaySink.disconnect(sessions.relay);
        sessions.relay = undefined;
      }
      sessions.relay = await this.relaySink.connect();
      sessions.reconnectRelay = false;
      this.metricsService.increment(METRIC_PATHS.SESSIONS_RECONNECTS_TOTAL);
    }

    return { mailbox: sessions.mailbox, relay: sessions.relay };
  }

  private scheduleReconnect(sessions: CycleSessions, error: RelayError): void {
    if (error instanceof ConnectionError) {
      if (error.origin === 'mailbox') {
        sessions.reconnectMailbox = true;
      } else {
        sessions.reconnectRelay = true;
      }
    } else if (error instanceof DeliveryError) {
      sessions.reconnectRelay = true;
    }
  }

  /**
   * The message is already delivered, so a failure here does not reopen the
   * candidate. It stays unseen on the server and the mailbox session is replaced.
   */
  private async markResolved(sessions: CycleSessions, uid: number): Promise<void> {
    try {
      await this.mailboxSource.markResolved(sessions.mailbox, uid);
    } catch (error) {
      this.logger.warn(`Forwarded UID ${uid} but could not mark it as seen: ${getErrorMessage(error)}`);
      sessions.reconnectMailbox = true;
    }
  }

  private async closeSessions(sessions: CycleSessions): Promise<void> {
    await this.mailboxSource.disconnect(sessions.mailbox);
    if (sessions.relay) {
      this.relaySink.disconnect(sessions.relay);
    }
  }
}
