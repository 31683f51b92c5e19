import { afterEach, describe, expect, it, vi } from 'vitest';

const SNAPSHOT_KEYS = [
  'NODE_ENV',
  'PORT',
  'INTENT_PROVIDER',
  'ANTHROPIC_API_KEY',
  'SPECIALIST_BASE_URLS',
  'PLANNER_BASE_URL',
  'DISCOVERY_TIMEOUT_MS',
  'REMOTE_CALL_TIMEOUT_MS',
  'FLIGHT_SERVICE_PORT',
];

const ORIGINAL_ENV = new Map<string, string | undefined>(SNAPSHOT_KEYS.map((key) => [key, process.env[key]]));

async function importConfigWith(overrides: Record<string, string | undefined>) {
  vi.resetModules();

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  return import('../../src/config.js');
}

describe('config', () => {
  afterEach(() => {
    for (const key of SNAPSHOT_KEYS) {
      const original = ORIGINAL_ENV.get(key);
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    }
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it('falls back to local defaults', async () => {
    const { default: config } = await importConfigWith({
      PORT: undefined,
      SPECIALIST_BASE_URLS: undefined,
      PLANNER_BASE_URL: undefined,
      INTENT_PROVIDER: undefined,
      DISCOVERY_TIMEOUT_MS: undefined,
      REMOTE_CALL_TIMEOUT_MS: undefined,
    });

    expect(config.port).toBe(5000);
    expect(config.plannerBaseUrl).toBe('http://127.0.0.1:5000');
    expect(config.discovery.specialistBaseUrls).toEqual([
      'http://127.0.0.1:5001',
      'http://127.0.0.1:5002',
      'http://127.0.0.1:5003',
    ]);
    expect(config.discovery.timeoutMs).toBe(5000);
    expect(config.remoteCall.timeoutMs).toBe(10000);
    expect(config.intents.provider).toBe('keyword');
  });

  it('splits and trims the specialist address list', async () => {
    const { default: config } = await importConfigWith({
      SPECIALIST_BASE_URLS: ' http://a.test , ,http://b.test',
    });

    expect(config.discovery.specialistBaseUrls).toEqual(['http://a.test', 'http://b.test']);
  });

  it('requires an API key for the llm provider', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { validateConfig } = await importConfigWith({
      INTENT_PROVIDER: 'llm',
      ANTHROPIC_API_KEY: undefined,
    });

    expect(() => validateConfig()).toThrow(/ANTHROPIC_API_KEY is required when INTENT_PROVIDER=llm/);
  });

  it('reports every invalid setting at once', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { validateConfig } = await importConfigWith({
      SPECIALIST_BASE_URLS: 'http://ok.test,ftp://bad.test',
      PORT: '70000',
      REMOTE_CALL_TIMEOUT_MS: '10',
    });

    let message = '';
    try {
      validateConfig();
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message).toContain('SPECIALIST_BASE_URLS contains an invalid URL: ftp://bad.test');
    expect(message).toContain('PORT must be 1-65535, got 70000');
    expect(message).toContain('REMOTE_CALL_TIMEOUT_MS must be >= 100, got 10');
  });

  it('accepts the test environment', async () => {
    const { validateConfig } = await importConfigWith({});

    expect(() => validateConfig()).not.toThrow();
  });
});
