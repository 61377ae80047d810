import { config } from 'dotenv';
import path from 'path';
import { AppConfig, BusyPolicy } from '../types/index.js';
import { DEFAULT_PROFILE_PATH } from './portal-profile.js';

// Load environment variables
config();

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

function parseLogLevel(value: string | undefined): AppConfig['log_level'] {
  const level = LOG_LEVELS.find(candidate => candidate === value);
  return level ?? 'info';
}

function parseBusyPolicy(value: string | undefined): BusyPolicy {
  return value === 'queue' ? 'queue' : 'reject';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.DATA_DIR || './data';

  return {
    port: parseInt(env.PORT || '8000', 10),
    host: env.HOST || '0.0.0.0',
    log_level: parseLogLevel(env.LOG_LEVEL),
    data_dir: dataDir,
    cookie_file: env.COOKIE_FILE || path.join(dataDir, 'cookie-record.json'),
    portal_profile_path: env.PORTAL_PROFILE_PATH || DEFAULT_PROFILE_PATH,
    busy_policy: parseBusyPolicy(env.BUSY_POLICY),

    browser: {
      headless: env.HEADLESS !== 'false',
      channel: env.BROWSER_CHANNEL || undefined,
    },

    timeouts: {
      navigation_ms: parseInt(env.NAVIGATION_TIMEOUT_MS || '30000', 10),
      field_ms: parseInt(env.FIELD_TIMEOUT_MS || '10000', 10),
      settle_ms: parseInt(env.SETTLE_TIMEOUT_MS || '20000', 10),
    },
  };
}

export function validateConfig(config: AppConfig, env: NodeJS.ProcessEnv = process.env): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (env.BUSY_POLICY && env.BUSY_POLICY !== 'queue' && env.BUSY_POLICY !== 'reject') {
    errors.push('BUSY_POLICY must be "queue" or "reject"');
  }

  const timeouts: Array<[string, number]> = [
    ['NAVIGATION_TIMEOUT_MS', config.timeouts.navigation_ms],
    ['FIELD_TIMEOUT_MS', config.timeouts.field_ms],
    ['SETTLE_TIMEOUT_MS', config.timeouts.settle_ms],
  ];
  for (const [name, value] of timeouts) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${name} must be a positive number of milliseconds`);
    }
  }

  if (!config.cookie_file) {
    errors.push('COOKIE_FILE must not be empty');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}
