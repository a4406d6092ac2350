export { loadSettings, parseSettings, applyEnvOverrides } from './settings';
export { loadEnvConfig } from './env';
export type {
  Settings,
  PathsConfig,
  LoggingConfig,
  RetryConfig,
  HttpConfig,
  SearchConfig,
  ExporterConfig,
  EnvConfig,
  AppEnv
} from './types';
