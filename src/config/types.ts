import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const PathsConfigSchema = z.object({
  data_dir: z.string().min(1),
  outputs_dir: z.string().min(1),
  db_file: z.string().min(1)
});

export const LoggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: z.enum(['json', 'pretty']).default('pretty')
});

export const RetryConfigSchema = z.object({
  max_retries: z.number().int().nonnegative().default(3),
  backoff_base_ms: z.number().nonnegative().default(1000),
  status_forcelist: z.array(z.number().int()).default([500, 502, 503, 504])
});

export const HttpConfigSchema = z.object({
  base_url: z.string().url(),
  timeout_ms: z.number().int().positive().default(10000),
  user_agent: z.string().min(1),
  accept_language: z.string().min(1).default('en-US,en;q=0.9'),
  retry: RetryConfigSchema
});

export const SearchConfigSchema = z
  .object({
    default_pages: z.number().int().min(1).default(1),
    max_pages: z.number().int().min(1).max(10).default(10),
    delay_min_ms: z.number().nonnegative().default(800),
    delay_max_ms: z.number().nonnegative().default(1800)
  })
  .refine((search) => search.delay_min_ms <= search.delay_max_ms, {
    message: 'delay_min_ms must not exceed delay_max_ms'
  })
  .refine((search) => search.default_pages <= search.max_pages, {
    message: 'default_pages must not exceed max_pages'
  });

export const ExporterConfigSchema = z.object({
  output_basename: z.string().min(1).default('products')
});

export const SettingsSchema = z.object({
  paths: PathsConfigSchema,
  logging: LoggingConfigSchema,
  http: HttpConfigSchema,
  search: SearchConfigSchema,
  exporter: ExporterConfigSchema
});

export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ExporterConfig = z.infer<typeof ExporterConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export type AppEnv = 'development' | 'testing' | 'production';

export interface EnvConfig {
  appEnv: AppEnv;
  logLevel?: string;
  dbFile?: string;
}
