import { BeforeApplicationShutdown, Inject, Injectable, Logger } from '@nestjs/common';
import { ForwarderService } from '../forwarder/forwarder.service';
import type { CycleReport } from '../forwarder/interfaces';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { MetricsService } from '../metrics/metrics.service';
import type { Sleep } from '../shared/async.utils';
import { getErrorMessage } from '../shared/error.utils';
import { SLEEP } from '../shared/shared.tokens';
import type { SchedulerOptions } from './interfaces';
import { SCHEDULER_OPTIONS } from './scheduler.tokens';

/**
 * Drives forwarding cycles, once or on a fixed interval.
 *
 * Shutdown aborts the loop between candidates and between cycles; the
 * application waits for the cycle in progress to wind down before closing.
 */
@Injectable()
export class RelaySchedulerService implements BeforeApplicationShutdown {
  private readonly logger = new Logger(RelaySchedulerService.name);
  private readonly shutdownController = new AbortController();
  private running?: Promise<unknown>;

  constructor(
    private readonly forwarder: ForwarderService,
    private readonly metricsService: MetricsService,
    @Inject(SCHEDULER_OPTIONS) private readonly options: SchedulerOptions,
    @Inject(SLEEP) private readonly sleep: Sleep,
  ) {}

  get stopped(): boolean {
    return this.shutdownController.signal.aborted;
  }

  /**
   * Runs a single cycle.
   *
   * @throws {Error} When the cycle fails as a whole (initial connect, listing)
   */
  async runOnce(): Promise<CycleReport> {
    return this.track(this.runCycle());
  }

  /**
   * Runs cycles until shutdown. A failed cycle is logged and the next one
   * starts after the usual interval.
   */
  async runForever(): Promise<void> {
    await this.track(this.loop());
  }

  /**
   * Requests the loop to stop at the next safe point.
   */
  stop(): void {
    if (!this.stopped) {
      this.logger.log('Stop requested; finishing the current candidate');
      this.shutdownController.abort();
    }
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    this.stop();
    if (this.running) {
      this.logger.log(`Waiting for the current cycle to finish${signal ? ` (${signal})` : ''}`);
      // failures are reported to whoever started the run
      await this.running.catch(() => undefined);
    }
  }

  private async loop(): Promise<void> {
    const intervalMs = this.options.pollIntervalSeconds * 1000;

    while (!this.stopped) {
      try {
        await this.runCycle();
      } catch (error) {
        const stack = error instanceof Error ? error.stack : undefined;
        this.logger.error(`Cycle failed: ${getErrorMessage(error)}`, stack);
      }

      if (this.stopped) {
        break;
      }

      this.logger.log(`Next cycle in ${this.options.pollIntervalSeconds}s`);
      await this.sleep(intervalMs, this.shutdownController.signal);
    }

    this.logger.log('Scheduler stopped');
  }

  private async runCycle(): Promise<CycleReport> {
    const startedAt = Date.now();
    this.metricsService.increment(METRIC_PATHS.CYCLES_TOTAL);

    try {
      const report = await this.forwarder.runCycle(this.shutdownController.signal);
      this.metricsService.set(METRIC_PATHS.CYCLES_LAST_FORWARDED, report.forwarded);
      return report;
    } catch (error) {
      this.metricsService.increment(METRIC_PATHS.CYCLES_FAILED);
      throw error;
    } finally {
      this.metricsService.set(METRIC_PATHS.CYCLES_LAST_DURATION_MS, Date.now() - startedAt);
      this.metricsService.logSnapshot();
    }
  }

  private track<T>(work: Promise<T>): Promise<T> {
    this.running = work;
    return work;
  }
}
