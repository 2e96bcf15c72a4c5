import { Logger } from '@nestjs/common';
import { buildRelayConfig } from './app.config';
import {
  DEFAULT_FETCH_CHUNK_SIZE,
  DEFAULT_IMAP_TIMEOUT_SECONDS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_STATE_PATH,
} from './config/config.constants';

const RELAY_ENV_KEYS = [
  'SRC_EMAIL',
  'SRC_PASSWORD',
  'IMAP_HOST',
  'IMAP_PORT',
  'IMAP_SSL',
  'IMAP_FOLDER',
  'IMAP_TIMEOUT',
  'SMTP_USER',
  'SMTP_PASSWORD',
  'SMTP_HOST',
  'SMTP_PORT',
  'SMTP_SSL',
  'SMTP_TIMEOUT',
  'DEST_EMAIL',
  'POLL_INTERVAL_SECONDS',
  'RELAY_MAX_ATTEMPTS',
  'RELAY_RETRY_BACKOFF_MS',
  'RELAY_MESSAGE_DELAY_MS',
  'RELAY_FETCH_CHUNK_SIZE',
  'RELAY_RUN_ONCE',
  'RELAY_STATE_PATH',
];

describe('app.config', () => {
  const originalEnv = process.env;
  let warnSpy: jest.SpyInstance;

  const setMinimalEnv = () => {
    process.env.SRC_EMAIL = 'relay@example.com';
    process.env.SRC_PASSWORD = 'test-secret';
    process.env.IMAP_HOST = 'imap.example.com';
    process.env.SMTP_USER = 'sender@example.net';
    process.env.SMTP_PASSWORD = 'test-secret';
    process.env.SMTP_HOST = 'smtp.example.net';
    process.env.DEST_EMAIL = 'inbox@example.org';
  };

  beforeEach(() => {
    process.env = { ...originalEnv };
    RELAY_ENV_KEYS.forEach((key) => delete process.env[key]);
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('defaults', () => {
    it('should apply defaults for every optional setting', () => {
      setMinimalEnv();
      process.env.NODE_ENV = 'production';

      const config = buildRelayConfig();

      expect(config.environment).toBe('production');
      expect(config.source).toEqual({
        user: 'relay@example.com',
        password: 'test-secret',
        host: 'imap.example.com',
        port: 993,
        secure: true,
        folder: 'INBOX',
        timeoutMs: DEFAULT_IMAP_TIMEOUT_SECONDS * 1000,
      });
      expect(config.destination).toMatchObject({
        host: 'smtp.example.net',
        port: 465,
        secure: true,
        address: 'inbox@example.org',
      });
      expect(config.forwarding).toEqual({
        maxAttempts: DEFAULT_MAX_ATTEMPTS,
        retryBackoffMs: 2000,
        messageDelayMs: 3000,
        fetchChunkSize: DEFAULT_FETCH_CHUNK_SIZE,
      });
      expect(config.schedule.pollIntervalSeconds).toBe(DEFAULT_POLL_INTERVAL_SECONDS);
      expect(config.progress.statePath).toBe(DEFAULT_STATE_PATH);
    });

    it('should switch to run-once mode from the environment', () => {
      setMinimalEnv();
      process.env.RELAY_RUN_ONCE = 'yes';

      expect(buildRelayConfig().schedule.runOnce).toBe(true);
    });
  });

  describe('required values', () => {
    it.each(['SRC_EMAIL', 'SRC_PASSWORD', 'IMAP_HOST', 'SMTP_USER', 'SMTP_PASSWORD', 'SMTP_HOST', 'DEST_EMAIL'])(
      'should fail when %s is missing',
      (key) => {
        setMinimalEnv();
        delete process.env[key];

        expect(() => buildRelayConfig()).toThrow(`${key} is required`);
      },
    );

    it('should reject a malformed destination address', () => {
      setMinimalEnv();
      process.env.DEST_EMAIL = 'not-an-address';

      expect(() => buildRelayConfig()).toThrow('Invalid e-mail address in DEST_EMAIL: "not-an-address"');
    });
  });

  describe('TLS resolution', () => {
    it('should follow the flag on a non-implicit port', () => {
      setMinimalEnv();
      process.env.IMAP_PORT = '143';
      process.env.IMAP_SSL = 'false';
      process.env.SMTP_PORT = '587';
      process.env.SMTP_SSL = 'false';

      const config = buildRelayConfig();

      expect(config.source.secure).toBe(false);
      expect(config.destination.secure).toBe(false);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should keep TLS on the implicit port and warn about the ignored flag', () => {
      setMinimalEnv();
      process.env.SMTP_SSL = 'false';

      const config = buildRelayConfig();

      expect(config.destination.secure).toBe(true);
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy.mock.calls[0][0]).toContain('SMTP_SSL=false is ignored on port 465');
    });

    it('should reject an out-of-range port', () => {
      setMinimalEnv();
      process.env.IMAP_PORT = '70000';

      expect(() => buildRelayConfig()).toThrow('Invalid port in IMAP_PORT: 70000');
    });
  });

  describe('forwarding settings', () => {
    it('should convert timeouts from seconds to milliseconds', () => {
      setMinimalEnv();
      process.env.IMAP_TIMEOUT = '30';
      process.env.SMTP_TIMEOUT = '45';

      const config = buildRelayConfig();

      expect(config.source.timeoutMs).toBe(30000);
      expect(config.destination.timeoutMs).toBe(45000);
    });

    it('should read the pipeline tuning values', () => {
      setMinimalEnv();
      process.env.RELAY_MAX_ATTEMPTS = '5';
      process.env.RELAY_RETRY_BACKOFF_MS = '0';
      process.env.RELAY_MESSAGE_DELAY_MS = '100';
      process.env.RELAY_FETCH_CHUNK_SIZE = '65536';

      expect(buildRelayConfig().forwarding).toEqual({
        maxAttempts: 5,
        retryBackoffMs: 0,
        messageDelayMs: 100,
        fetchChunkSize: 65536,
      });
    });

    it('should require at least one attempt', () => {
      setMinimalEnv();
      process.env.RELAY_MAX_ATTEMPTS = '0';

      expect(() => buildRelayConfig()).toThrow('RELAY_MAX_ATTEMPTS must be at least 1 (got 0)');
    });

    it('should reject a tiny fetch chunk', () => {
      setMinimalEnv();
      process.env.RELAY_FETCH_CHUNK_SIZE = '512';

      expect(() => buildRelayConfig()).toThrow('RELAY_FETCH_CHUNK_SIZE must be at least 1024 bytes (got 512)');
    });
  });
});
