import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import type { AppEnv, EnvConfig } from './types';

let cachedEnv: EnvConfig | null = null;

function parseAppEnv(value: string | undefined): AppEnv {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === 'testing' || normalized === 'production') {
    return normalized;
  }
  return 'development';
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = {
    appEnv: parseAppEnv(process.env.APP_ENV),
    logLevel: nonEmpty(process.env.LOG_LEVEL),
    dbFile: nonEmpty(process.env.DB_FILE)
  };

  return cachedEnv;
}
