export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'y', 'on'];
export const BOOLEAN_FALSE_VALUES = ['false', '0', 'no', 'n', 'off'];

// Conventional implicit-TLS ports
export const IMAP_IMPLICIT_TLS_PORT = 993;
export const SMTP_IMPLICIT_TLS_PORT = 465;

// Configuration defaults
export const DEFAULT_IMAP_PORT = IMAP_IMPLICIT_TLS_PORT;
export const DEFAULT_IMAP_SSL = true;
export const DEFAULT_IMAP_FOLDER = 'INBOX';
export const DEFAULT_IMAP_TIMEOUT_SECONDS = 120;
export const DEFAULT_SMTP_PORT = SMTP_IMPLICIT_TLS_PORT;
export const DEFAULT_SMTP_SSL = true;
export const DEFAULT_SMTP_TIMEOUT_SECONDS = 120;
export const DEFAULT_POLL_INTERVAL_SECONDS = 3600;
export const DEFAULT_STATE_PATH = 'state.json';

// Forwarding pipeline defaults
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 2000;
export const DEFAULT_MESSAGE_DELAY_MS = 3000;
export const DEFAULT_FETCH_CHUNK_SIZE = 512 * 1024; // 512 KiB
export const MIN_FETCH_CHUNK_SIZE = 1024;

export const MIN_PORT = 1;
export const MAX_PORT = 65535;
