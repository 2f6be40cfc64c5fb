/**
 * Service configuration: parsed once from the environment, then injected.
 *
 * - zod validates at the boundary and produces typed, branded values
 * - failures are returned as data (`ConfigInvalid`), never thrown
 * - the operating mode flag is not part of this schema; it is resolved
 *   separately by `resolveOperatingMode` so a malformed flag never fails startup
 */

import { z } from 'zod';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type ListenPort = Brand<number, 'ListenPort'>;
export type SettingsPath = Brand<string, 'SettingsPath'>;

export type HttpsPolicy = { readonly kind: 'redirect_to_https' } | { readonly kind: 'allow_plain_http' };

export interface AppConfig {
  readonly server: {
    readonly host: string;
    readonly port: ListenPort;
    readonly https: HttpsPolicy;
  };
  readonly paths: {
    readonly settingsFile: SettingsPath;
  };
  readonly auth: {
    readonly apiKey: string | undefined;
  };
  readonly logging: {
    readonly level: LogLevel;
  };
  readonly speech: {
    readonly apiKey: string | undefined;
    readonly baseUrl: string;
    readonly voice: string;
    readonly model: string;
    readonly language: string | undefined;
    readonly transcriptionModel: string;
  };
  readonly actuator: {
    readonly url: string | undefined;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Readonly<Record<string, string | undefined>>;
}

export const DEFAULT_SETTINGS_PATH = 'config/robodog.json';
export const DEFAULT_PORT = 8000;

// =============================================================================
// Schema
// =============================================================================

/** Empty strings count as unset, the way a shell `FOO=` line reads. */
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const EnvSchema = z.object({
  VCT_HOST: z.string().min(1).default('0.0.0.0'),

  VCT_PORT: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: 'VCT_PORT must be a number' })
        .int('VCT_PORT must be an integer')
        .min(1, 'Port must be >= 1')
        .max(65535, 'Port must be <= 65535')
        .default(DEFAULT_PORT)
    ),

  VCT_CONFIG: z.string().min(1).default(DEFAULT_SETTINGS_PATH),

  VCT_API_KEY: optionalText,

  VCT_REQUIRE_HTTPS: z.enum(['0', '1']).default('0'),

  VCT_LOG_LEVEL: z
    .string()
    .default('info')
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])),

  VCT_ACTUATOR_URL: optionalText.pipe(z.string().url('VCT_ACTUATOR_URL must be a URL').optional()),

  OPENAI_API_KEY: optionalText,
  OPENAI_BASE_URL: z.string().url('OPENAI_BASE_URL must be a URL').default('https://api.openai.com/v1'),
  OPENAI_TTS_VOICE: z.string().min(1).default('alloy'),
  OPENAI_TTS_MODEL: z.string().min(1).default('gpt-4o-mini-tts'),
  OPENAI_TTS_LANGUAGE: optionalText,
  OPENAI_STT_MODEL: z.string().min(1).default('whisper-1'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid('environment', toConfigIssues(parsed.error)));
  }

  return ok(brandConfig(buildConfig(parsed.data)));
}

// =============================================================================
// Internal
// =============================================================================

function brandConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

function buildConfig(env: ParsedEnv): AppConfig {
  const https: HttpsPolicy =
    env.VCT_REQUIRE_HTTPS === '1' ? { kind: 'redirect_to_https' } : { kind: 'allow_plain_http' };

  return {
    server: {
      host: env.VCT_HOST,
      port: env.VCT_PORT as ListenPort,
      https,
    },
    paths: {
      settingsFile: env.VCT_CONFIG as SettingsPath,
    },
    auth: {
      apiKey: env.VCT_API_KEY,
    },
    logging: {
      level: env.VCT_LOG_LEVEL,
    },
    speech: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL.replace(/\/+$/, ''),
      voice: env.OPENAI_TTS_VOICE,
      model: env.OPENAI_TTS_MODEL,
      language: env.OPENAI_TTS_LANGUAGE,
      transcriptionModel: env.OPENAI_STT_MODEL,
    },
    actuator: {
      url: env.VCT_ACTUATOR_URL?.replace(/\/+$/, ''),
    },
  };
}

export function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
