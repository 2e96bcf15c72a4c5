/**
 * Identifies one independent watermark stream.
 */
export interface ProgressKey {
  account: string;
  host: string;
  folder: string;
}

/**
 * Persisted record: one integer watermark per serialised progress key.
 */
export type ProgressState = Record<string, number>;

export function formatProgressKey(key: ProgressKey): string {
  return `${key.account}:${key.host}:${key.folder}`;
}
