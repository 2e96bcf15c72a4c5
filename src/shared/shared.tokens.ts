/** Injection token for the {@link Sleep} used by backoff and poll delays. */
export const SLEEP = Symbol('SLEEP');
