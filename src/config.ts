/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access for the call sync service.
 *
 * Environment variables:
 * - AMOCRM_SUBDOMAIN / AMOCRM_CLIENT_ID / AMOCRM_CLIENT_SECRET / AMOCRM_REDIRECT_URI: OAuth app (required)
 * - AMOCRM_BASE_URL: Override for the account URL (defaults to https://{subdomain}.amocrm.ru)
 * - TOKEN_FILE: Where the OAuth token pair is persisted
 * - AMI_HOST / AMI_PORT / AMI_USERNAME / AMI_SECRET: Asterisk manager interface
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to stop syncing calls to the CRM
 * - UNKNOWN_CONTACT_POLICY: skip | create_contact | unsorted
 * - PORT / HOST: HTTP server bind address
 */

import 'dotenv/config';

export type UnknownContactPolicy = 'skip' | 'create_contact' | 'unsorted';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  amocrm: {
    baseUrl: string;
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    tokenFile: string;
    refreshMarginMs: number;
    requestTimeoutMs: number;
  };
  ami: {
    host: string;
    port: number;
    username: string;
    secret: string;
    reconnectBaseMs: number;
    reconnectMaxMs: number;
    pingIntervalMs: number;
  };
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  tracker: {
    sessionTimeoutMs: number;
    sweepIntervalMs: number;
    defaultCountryCode: string;
  };
  sync: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    pbxConcurrency: number;
    webhookConcurrency: number;
    unknownContactPolicy: UnknownContactPolicy;
    recordingsDir: string;
    leadKeyTtlSeconds: number;
  };
  server: {
    host: string;
    port: number;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function parseUnknownContactPolicy(raw: string): UnknownContactPolicy {
  if (raw === 'skip' || raw === 'create_contact' || raw === 'unsorted') {
    return raw;
  }
  throw new Error(`UNKNOWN_CONTACT_POLICY must be skip, create_contact or unsorted, got "${raw}"`);
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';
const subdomain = requiredEnv('AMOCRM_SUBDOMAIN');

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  amocrm: {
    baseUrl: optionalEnv('AMOCRM_BASE_URL', `https://${subdomain}.amocrm.ru`),
    clientId: requiredEnv('AMOCRM_CLIENT_ID'),
    clientSecret: requiredEnv('AMOCRM_CLIENT_SECRET'),
    redirectUri: requiredEnv('AMOCRM_REDIRECT_URI'),
    tokenFile: optionalEnv('TOKEN_FILE', './data/tokens.json'),
    refreshMarginMs: intEnv('TOKEN_REFRESH_MARGIN_MS', 5 * 60 * 1000),
    requestTimeoutMs: intEnv('CRM_TIMEOUT_MS', 15_000),
  },
  ami: {
    host: optionalEnv('AMI_HOST', '127.0.0.1'),
    port: intEnv('AMI_PORT', 5038),
    username: requiredEnv('AMI_USERNAME'),
    secret: requiredEnv('AMI_SECRET'),
    reconnectBaseMs: intEnv('AMI_RECONNECT_BASE_MS', 1000),
    reconnectMaxMs: intEnv('AMI_RECONNECT_MAX_MS', 30_000),
    pingIntervalMs: intEnv('AMI_PING_INTERVAL_MS', 10_000),
  },
  redis: {
    url: process.env.REDIS_URL ?? undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD ?? undefined,
  },
  tracker: {
    sessionTimeoutMs: intEnv('SESSION_TIMEOUT_MS', 2 * 60 * 60 * 1000),
    sweepIntervalMs: intEnv('SESSION_SWEEP_INTERVAL_MS', 60_000),
    defaultCountryCode: optionalEnv('DEFAULT_COUNTRY_CODE', '7'),
  },
  sync: {
    maxAttempts: intEnv('SYNC_MAX_ATTEMPTS', 5),
    baseDelayMs: intEnv('SYNC_BASE_DELAY_MS', 2000),
    maxDelayMs: intEnv('SYNC_MAX_DELAY_MS', 60_000),
    pbxConcurrency: intEnv('SYNC_PBX_CONCURRENCY', 4),
    webhookConcurrency: intEnv('SYNC_WEBHOOK_CONCURRENCY', 2),
    unknownContactPolicy: parseUnknownContactPolicy(optionalEnv('UNKNOWN_CONTACT_POLICY', 'unsorted')),
    recordingsDir: optionalEnv('RECORDINGS_DIR', '/var/spool/asterisk/monitor'),
    leadKeyTtlSeconds: intEnv('LEAD_KEY_TTL_SECONDS', 30 * 24 * 60 * 60),
  },
  server: {
    host: optionalEnv('HOST', '0.0.0.0'),
    port: intEnv('PORT', 8080),
  },
};
