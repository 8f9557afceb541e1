import { z } from 'zod';
import { AnalyticsError } from '../domain/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Host-supplied SDK options. Every key except `app_id` has a default.
 */
export const sdkConfigSchema = z.object({
  app_id: z.string().trim().min(1, 'app_id is required'),
  base_url: z.string().url().default('https://api.analytics-sdk.com'),
  session_timeout_seconds: z.number().positive().default(1800),
  batch_size: z.number().int().min(1).max(1000).default(50),
  flush_interval_seconds: z.number().positive().default(60),
  max_queue_size: z.number().int().min(1).default(1000),
  max_retries: z.number().int().min(1).max(10).default(3),
  max_backoff_seconds: z.number().positive().default(60),
  request_timeout_seconds: z.number().positive().default(30),
  max_delivery_attempts: z.number().int().min(1).default(10),
  consent_ttl_days: z.number().positive().default(365),
  requires_user_consent: z.boolean().default(true),
  location_tracking_enabled: z.boolean().default(false),
  local_rules_enabled: z.boolean().default(true),
  auto_tracking_enabled: z.boolean().default(true),
  rules_sync_interval_seconds: z.number().positive().default(3600),
  app_version: z.string().min(1).default('0.0.0'),
  log_level: z.enum(LOG_LEVELS).default('info'),
});

export type SdkConfig = z.infer<typeof sdkConfigSchema>;
export type SdkConfigInput = z.input<typeof sdkConfigSchema>;

export type ConfigResult =
  | { readonly ok: true; readonly config: SdkConfig }
  | { readonly ok: false; readonly error: AnalyticsError };

function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  const baseUrl = env['ANALYTICS_BASE_URL'];
  if (baseUrl) overrides['base_url'] = baseUrl;
  const level = env['ANALYTICS_LOG_LEVEL'] ?? env['LOG_LEVEL'];
  if (level) overrides['log_level'] = level.toLowerCase();
  return overrides;
}

/**
 * Validates SDK options and fills defaults.
 *
 * Environment values (`ANALYTICS_BASE_URL`, `ANALYTICS_LOG_LEVEL`,
 * `LOG_LEVEL`) apply only where the explicit input leaves a key unset.
 * Never throws.
 */
export function loadSdkConfig(input: unknown, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return {
      ok: false,
      error: new AnalyticsError('invalid_configuration', 'Configuration must be an object'),
    };
  }

  const explicit = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
  const parsed = sdkConfigSchema.safeParse({ ...envOverrides(env), ...explicit });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    return {
      ok: false,
      error: new AnalyticsError('invalid_configuration', `Invalid configuration: ${detail}`, { cause: parsed.error }),
    };
  }
  return { ok: true, config: parsed.data };
}
