export const SCHEDULER_OPTIONS = Symbol('SCHEDULER_OPTIONS');
