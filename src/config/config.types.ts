/**
 * Connection settings for the source mailbox (IMAP).
 */
export interface SourceConfig {
  user: string;
  password: string;
  host: string;
  port: number;
  /** Resolved TLS mode: explicit flag OR implicit-TLS port */
  secure: boolean;
  folder: string;
  /** Per-operation timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Connection settings for the outbound relay (SMTP).
 */
export interface DestinationConfig {
  user: string;
  password: string;
  host: string;
  port: number;
  secure: boolean;
  timeoutMs: number;
  /** Fixed address every relayed message is delivered to */
  address: string;
}

export interface ForwardingConfig {
  maxAttempts: number;
  retryBackoffMs: number;
  messageDelayMs: number;
  fetchChunkSize: number;
}

/**
 * Configuration type definition for type-safe access
 */
export interface RelayConfiguration {
  environment: string;
  source: SourceConfig;
  destination: DestinationConfig;
  forwarding: ForwardingConfig;
  schedule: {
    pollIntervalSeconds: number;
    runOnce: boolean;
  };
  progress: {
    statePath: string;
  };
}
