import { Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from '../shared/error.utils';
import type { MetricPath } from './metrics.constants';
import type { Metrics } from './interfaces';

type MetricGroup = keyof Metrics;

/**
 * @class MetricsService
 * @description Collects the relay's counters in memory. Values are never exported; the
 * scheduler logs a snapshot after every cycle.
 */
@Injectable()
export class MetricsService {
  /** Logger instance for the MetricsService */
  private readonly logger = new Logger(MetricsService.name);
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();

  /** Internal storage for all metrics values */
  private metrics: Metrics = {
    cycles: {
      total: 0,
      failed: 0,
      last_forwarded: 0,
      last_duration_ms: 0,
    },
    messages: {
      forwarded_total: 0,
      degraded_total: 0,
      skipped_total: 0,
    },
    attempts: {
      failed_total: 0,
    },
    sessions: {
      reconnects_total: 0,
    },
    server: {
      uptime_seconds: 0,
    },
  };

  /**
   * Retrieves the current state of all metrics.
   * @returns {Readonly<Metrics>} A copy of all metrics with dynamically calculated uptime.
   */
  getMetrics(): Readonly<Metrics> {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime) / 1000);

    return {
      cycles: { ...this.metrics.cycles },
      messages: { ...this.metrics.messages },
      attempts: { ...this.metrics.attempts },
      sessions: { ...this.metrics.sessions },
      server: { uptime_seconds: uptimeSeconds },
    };
  }

  /**
   * Increments a specific metric by the given value.
   * @param {MetricPath} path - The dot-separated path to the metric to increment.
   * @param {number} value - The value to increment by (default: 1).
   */
  increment(path: MetricPath, value: number = 1): void {
    this.update(path, 'increment', (current) => current + value);
  }

  /**
   * Sets a specific metric to the given value.
   * @param {MetricPath} path - The dot-separated path to the metric to set.
   * @param {number} value - The value to set the metric to.
   */
  set(path: MetricPath, value: number): void {
    this.update(path, 'set', () => value);
  }

  /**
   * Writes the current counters to the log as one line.
   */
  logSnapshot(): void {
    const { cycles, messages, attempts, sessions, server } = this.getMetrics();
    this.logger.log(
      `Metrics: cycles=${cycles.total} (failed ${cycles.failed}), ` +
        `forwarded=${messages.forwarded_total} (degraded ${messages.degraded_total}), ` +
        `skipped=${messages.skipped_total}, failed attempts=${attempts.failed_total}, ` +
        `reconnects=${sessions.reconnects_total}, uptime=${server.uptime_seconds}s`,
    );
  }

  private update(path: MetricPath, operation: string, apply: (current: number) => number): void {
    try {
      const [groupKey, key] = path.split('.');
      if (!this.isGroup(groupKey)) {
        throw new Error(`Invalid metric path: ${path} (key "${groupKey}" not found)`);
      }

      const group: Record<string, number> = this.metrics[groupKey];
      if (typeof group[key] !== 'number') {
        throw new Error(`Invalid metric path: ${path} (not a number)`);
      }

      group[key] = apply(group[key]);
    } catch (error) {
      this.logger.error(`Failed to ${operation} metric ${path}: ${getErrorMessage(error)}`);
    }
  }

  private isGroup(key: string): key is MetricGroup {
    return Object.prototype.hasOwnProperty.call(this.metrics, key);
  }
}
