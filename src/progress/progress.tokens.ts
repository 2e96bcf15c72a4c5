export const PROGRESS_STATE_PATH = Symbol('PROGRESS_STATE_PATH');
