import { resolve } from 'node:path';

import { DEFAULT_READINESS_TIMINGS, ReadinessTimings } from './readiness.js';

export const INSTANCE_PREFIX = 'wp-test-';
export const COMPOSE_FILE = 'docker-compose.yml';
export const CONTENT_DIR = 'wp-content';
export const SITE_INFO_FILE = 'site-info.txt';
export const STATE_DIR = '.wpdock';

// Credentials baked into every generated compose file. Local development only.
export const DATABASE = {
  HOST: 'db',
  NAME: 'wordpress',
  PASSWORD: 'wordpress',
  ROOT_PASSWORD: 'rootpassword',
  USER: 'wordpress',
} as const;

export interface AdminCredentials {
  email: string;
  password: string;
  user: string;
}

export interface Settings {
  admin: AdminCredentials;
  debug: boolean;
  siteTitle: string;
  timings: ReadinessTimings;
  workspace: string;
}

export const DEFAULT_ADMIN: AdminCredentials = {
  email: 'admin@example.com',
  password: 'password',
  user: 'admin',
};

type Env = Record<string, string | undefined>;

function envSeconds(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${key} must be a non-negative number of seconds, got "${raw}"`);
  }

  return value;
}

/**
 * Builds the settings from the environment. Flags passed to a command
 * override the values returned here.
 */
export function loadSettings(env: Env = process.env, overrides: Partial<Settings> = {}): Settings {
  const defaults = DEFAULT_READINESS_TIMINGS;
  const timings: ReadinessTimings = {
    appInstalled: {
      interval: defaults.appInstalled.interval,
      maxWait: envSeconds(env, 'WPDOCK_INSTALL_TIMEOUT', defaults.appInstalled.maxWait),
    },
    containersHealthy: {
      interval: defaults.containersHealthy.interval,
      maxWait: envSeconds(env, 'WPDOCK_HEALTHY_TIMEOUT', defaults.containersHealthy.maxWait),
    },
    databaseReachable: {
      interval: defaults.databaseReachable.interval,
      maxWait: envSeconds(env, 'WPDOCK_DB_TIMEOUT', defaults.databaseReachable.maxWait),
    },
    grace: envSeconds(env, 'WPDOCK_GRACE_SECONDS', defaults.grace),
    httpAttempts: defaults.httpAttempts,
    httpInterval: defaults.httpInterval,
  };

  return {
    admin: {
      email: env.WPDOCK_ADMIN_EMAIL || DEFAULT_ADMIN.email,
      password: env.WPDOCK_ADMIN_PASSWORD || DEFAULT_ADMIN.password,
      user: env.WPDOCK_ADMIN_USER || DEFAULT_ADMIN.user,
    },
    debug: env.WPDOCK_DEBUG === '1' || env.WPDOCK_DEBUG === 'true',
    siteTitle: 'WordPress Development Site',
    timings,
    workspace: resolve(env.WPDOCK_WORKSPACE || process.cwd()),
    ...overrides,
  };
}
