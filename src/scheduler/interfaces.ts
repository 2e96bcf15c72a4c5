export interface SchedulerOptions {
  /** Pause between the end of one cycle and the start of the next */
  pollIntervalSeconds: number;
}
