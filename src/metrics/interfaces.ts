/**
 * @interface Metrics
 * @description Counters describing the relay's progress since the process started.
 */
export interface Metrics {
  /**
   * @property {object} cycles - Forwarding cycle metrics
   */
  cycles: {
    /** Cycles started */
    total: number;
    /** Cycles aborted by a cycle-level error */
    failed: number;
    /** Messages forwarded by the most recent cycle */
    last_forwarded: number;
    /** Wall-clock duration of the most recent cycle */
    last_duration_ms: number;
  };

  /**
   * @property {object} messages - Per-candidate outcomes
   * @description Every candidate ends as forwarded (possibly degraded) or skipped.
   */
  messages: {
    /** Messages relayed at any fidelity */
    forwarded_total: number;
    /** Messages relayed text-only, without attachments */
    degraded_total: number;
    /** Messages that exhausted every attempt */
    skipped_total: number;
  };

  attempts: {
    /** Failed attempts across all candidates */
    failed_total: number;
  };

  sessions: {
    /** Mailbox and relay sessions replaced mid-cycle */
    reconnects_total: number;
  };

  server: {
    /** Process uptime in seconds */
    uptime_seconds: number;
  };
}
