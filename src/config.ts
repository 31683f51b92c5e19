/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration across the planner and the
 * specialist services.
 *
 * @see .env.example for the full list of variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an env var that may be required depending on other settings. */
function required(key: string): string | undefined {
  return process.env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read a comma-separated list env var. */
function optionalList(key: string, defaultValue: string[]): string[] {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export type IntentProvider = 'llm' | 'keyword';

function intentProvider(): IntentProvider {
  return optional('INTENT_PROVIDER', 'keyword') === 'llm' ? 'llm' : 'keyword';
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const port = optionalInt('PORT', 5000);

const config = {
  port,
  nodeEnv: optional('NODE_ENV', 'development'),

  /** Address the planner advertises on its own agent card */
  plannerBaseUrl: optional('PLANNER_BASE_URL', `http://127.0.0.1:${port}`),

  /** Capability discovery */
  discovery: {
    specialistBaseUrls: optionalList('SPECIALIST_BASE_URLS', [
      'http://127.0.0.1:5001',
      'http://127.0.0.1:5002',
      'http://127.0.0.1:5003',
    ]),
    timeoutMs: optionalInt('DISCOVERY_TIMEOUT_MS', 5000),
  },

  /** Outbound search/book calls (single attempt, no retry) */
  remoteCall: {
    timeoutMs: optionalInt('REMOTE_CALL_TIMEOUT_MS', 10000),
  },

  /** Intent understanding */
  intents: {
    provider: intentProvider(),
    anthropicApiKey: required('ANTHROPIC_API_KEY'),
    modelId: optional('INTENT_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    defaultOrigin: optional('DEFAULT_ORIGIN', 'Singapore'),
    defaultDestination: optional('DEFAULT_DESTINATION', 'London'),
  },

  /** Ports for the bundled mock specialist services */
  specialists: {
    flightPort: optionalInt('FLIGHT_SERVICE_PORT', 5001),
    hotelPort: optionalInt('HOTEL_SERVICE_PORT', 5002),
    carPort: optionalInt('CAR_SERVICE_PORT', 5003),
    host: optional('SPECIALIST_HOST', '127.0.0.1'),
  },
};

export type AppConfig = typeof config;

function isValidPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (config.intents.provider === 'llm' && !config.intents.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when INTENT_PROVIDER=llm');
  }

  if (config.discovery.specialistBaseUrls.length === 0) {
    errors.push('SPECIALIST_BASE_URLS must list at least one address');
  }
  for (const url of config.discovery.specialistBaseUrls) {
    if (!isHttpUrl(url)) {
      errors.push(`SPECIALIST_BASE_URLS contains an invalid URL: ${url}`);
    }
  }
  if (!isHttpUrl(config.plannerBaseUrl)) {
    errors.push(`PLANNER_BASE_URL must be an http(s) URL, got ${config.plannerBaseUrl}`);
  }

  const ports: Array<[string, number]> = [
    ['PORT', config.port],
    ['FLIGHT_SERVICE_PORT', config.specialists.flightPort],
    ['HOTEL_SERVICE_PORT', config.specialists.hotelPort],
    ['CAR_SERVICE_PORT', config.specialists.carPort],
  ];
  for (const [key, value] of ports) {
    if (!isValidPort(value)) {
      errors.push(`${key} must be 1-65535, got ${value}`);
    }
  }

  if (!(config.discovery.timeoutMs >= 100)) {
    errors.push(`DISCOVERY_TIMEOUT_MS must be >= 100, got ${config.discovery.timeoutMs}`);
  }
  if (!(config.remoteCall.timeoutMs >= 100)) {
    errors.push(`REMOTE_CALL_TIMEOUT_MS must be >= 100, got ${config.remoteCall.timeoutMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
