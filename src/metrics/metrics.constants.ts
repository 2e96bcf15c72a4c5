export const METRIC_PATHS = {
  // Cycles
  CYCLES_TOTAL: 'cycles.total',
  CYCLES_FAILED: 'cycles.failed',
  CYCLES_LAST_FORWARDED: 'cycles.last_forwarded',
  CYCLES_LAST_DURATION_MS: 'cycles.last_duration_ms',

  // Messages
  MESSAGES_FORWARDED_TOTAL: 'messages.forwarded_total',
  MESSAGES_DEGRADED_TOTAL: 'messages.degraded_total',
  MESSAGES_SKIPPED_TOTAL: 'messages.skipped_total',

  // Attempts
  ATTEMPTS_FAILED_TOTAL: 'attempts.failed_total',

  // Sessions
  SESSIONS_RECONNECTS_TOTAL: 'sessions.reconnects_total',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
