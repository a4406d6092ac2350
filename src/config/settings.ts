import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';

import type { LogLevel } from '../utils/logger';
import { SettingsSchema, type EnvConfig, type Settings } from './types';

let cachedSettings: Settings | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseSettings(fileContents: string): Settings {
  const result = SettingsSchema.safeParse(parse(fileContents));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`Invalid settings: ${issues.join('; ')}`);
  }
  return result.data;
}

export function loadSettings(configPath = resolve(process.cwd(), 'configs', 'settings.yaml')): Settings {
  if (cachedSettings) {
    return cachedSettings;
  }

  const fileContents = readFileSync(configPath, 'utf-8');
  cachedSettings = parseSettings(fileContents);
  return cachedSettings;
}

/**
 * Environment variables win over the YAML file. Production never logs below
 * `info` unless LOG_LEVEL asks for it explicitly.
 */
export function applyEnvOverrides(settings: Settings, env: EnvConfig): Settings {
  const requestedLevel = env.logLevel?.toLowerCase();
  let level: LogLevel = settings.logging.level;
  if (requestedLevel && isLogLevel(requestedLevel)) {
    level = requestedLevel;
  } else if (env.appEnv === 'production' && level === 'debug') {
    level = 'info';
  }

  return {
    ...settings,
    logging: { ...settings.logging, level },
    paths: { ...settings.paths, db_file: env.dbFile ?? settings.paths.db_file }
  };
}
