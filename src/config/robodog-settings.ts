/**
 * RoboDog settings file: command phrases, reward triggers, policy weights and
 * environment context. YAML (`.yaml`, `.yml` or no suffix), JSON or TOML on
 * disk, validated and normalised with zod.
 *
 * Keys keep the file's snake_case so `vct config set commands_map.sit SIT`
 * addresses exactly what is written to disk.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { ResultAsync, errAsync, err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { ConfigIssue } from '../errors/app-error.js';
import { toConfigIssues } from './app-config.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { isJsonObject } from '../types/json.js';

// =============================================================================
// Schema
// =============================================================================

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const numberMap = z
  .record(z.string(), z.coerce.number())
  .nullish()
  .transform((value) => value ?? {});

const CommandsMapSchema = z
  .record(z.string(), scalar)
  .nullish()
  .transform((value, ctx) => {
    const normalized: Record<string, string> = {};
    for (const [rawKey, rawAction] of Object.entries(value ?? {})) {
      const phrase = rawKey.trim().replace(/^['"]+|['"]+$/g, '');
      if (!phrase) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Command map keys must be non-empty strings' });
        return z.NEVER;
      }
      normalized[phrase.toLowerCase()] = String(rawAction).trim().toUpperCase() || 'NONE';
    }
    return normalized;
  });

const RewardTriggersSchema = z
  .record(z.string(), z.union([z.boolean(), z.number()]))
  .nullish()
  .transform((value) => {
    const normalized: Record<string, boolean> = {};
    for (const [action, enabled] of Object.entries(value ?? {})) {
      normalized[action.trim().toUpperCase()] = Boolean(enabled);
    }
    return normalized;
  });

const PolicySection = z.record(z.string(), z.unknown()).nullable().default(null);

export const RoboDogSettingsSchema = z.object({
  latency_budget_ms: z.number().int().min(0).default(300),
  reward_cooldown_s: z.number().min(0).default(3.0),
  weights: numberMap,
  behavior_policy: PolicySection,
  policy: PolicySection,
  commands_map: CommandsMapSchema,
  reward_triggers: RewardTriggersSchema,
  environment_context: numberMap,
  mood_initial: z.string().nullable().default(null),
});

export type RoboDogSettings = z.infer<typeof RoboDogSettingsSchema>;

// =============================================================================
// Errors
// =============================================================================

export type SettingsError =
  | { readonly code: 'SETTINGS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'SETTINGS_UNSUPPORTED_FORMAT'; readonly message: string }
  | { readonly code: 'SETTINGS_PARSE_ERROR'; readonly message: string }
  | { readonly code: 'SETTINGS_INVALID'; readonly message: string; readonly issues: readonly ConfigIssue[] }
  | { readonly code: 'SETTINGS_IO_ERROR'; readonly message: string }
  | { readonly code: 'SETTINGS_KEY_PATH_EMPTY'; readonly message: string };

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

function mapReadError(e: unknown, filePath: string): SettingsError {
  if (nodeErrorCode(e) === 'ENOENT') {
    return { code: 'SETTINGS_NOT_FOUND', message: `Configuration file not found: ${filePath}` };
  }
  return { code: 'SETTINGS_IO_ERROR', message: `Cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

// =============================================================================
// Public API
// =============================================================================

export function parseSettings(payload: unknown): Result<RoboDogSettings, SettingsError> {
  const parsed = RoboDogSettingsSchema.safeParse(payload ?? {});
  if (!parsed.success) {
    const issues = toConfigIssues(parsed.error);
    return err({
      code: 'SETTINGS_INVALID',
      message: issues.map((i) => `${i.path}: ${i.message}`).join('; '),
      issues,
    });
  }
  return ok(parsed.data);
}

export type SettingsFormat = 'yaml' | 'json' | 'toml';

/** Format chosen by the file suffix; a path without one is YAML. */
export function settingsFormatOf(filePath: string): Result<SettingsFormat, SettingsError> {
  const suffix = path.extname(filePath).toLowerCase();
  switch (suffix) {
    case '':
    case '.yaml':
    case '.yml':
      return ok<SettingsFormat, SettingsError>('yaml');
    case '.json':
      return ok<SettingsFormat, SettingsError>('json');
    case '.toml':
      return ok<SettingsFormat, SettingsError>('toml');
    default:
      return err({ code: 'SETTINGS_UNSUPPORTED_FORMAT', message: `Unsupported configuration format: ${suffix}` });
  }
}

export function loadSettings(filePath: string): ResultAsync<RoboDogSettings, SettingsError> {
  const format = settingsFormatOf(filePath);
  if (format.isErr()) return errAsync(format.error);

  return ResultAsync.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapReadError(e, filePath))
    .andThen((text) => parseDocument(text, format.value, filePath))
    .andThen(parseSettings);
}

/** Writes the settings in the file's format with keys sorted, so diffs stay small. */
export function saveSettings(filePath: string, settings: RoboDogSettings): ResultAsync<void, SettingsError> {
  const format = settingsFormatOf(filePath);
  if (format.isErr()) return errAsync(format.error);

  const serialized = serializeSettings(settings, format.value);
  return ResultAsync.fromPromise(fs.writeFile(filePath, serialized, 'utf8'), (e) => ({
    code: 'SETTINGS_IO_ERROR' as const,
    message: `Cannot write ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
  }));
}

/**
 * Renders the settings with keys sorted. TOML has no null, so unset policy
 * sections are left out and come back as their defaults on load.
 */
export function serializeSettings(settings: RoboDogSettings, format: SettingsFormat): string {
  const sorted = sortKeys(toJson(settings));
  switch (format) {
    case 'yaml':
      return stringifyYaml(sorted);
    case 'json':
      return `${JSON.stringify(sorted, null, 2)}\n`;
    case 'toml': {
      const table = withoutNulls(sorted);
      return `${stringifyToml(isJsonObject(table) ? table : {})}\n`;
    }
  }
}

/**
 * Configuration handed to the behaviour policy: an explicit `behavior_policy`
 * section wins, then the older `policy` section, then a bare `weights` map.
 */
export function policyConfig(settings: RoboDogSettings): Record<string, unknown> {
  if (settings.behavior_policy !== null) return settings.behavior_policy;
  if (settings.policy !== null) return settings.policy;
  if (Object.keys(settings.weights).length > 0) return settings.weights;
  return {};
}

export function updateSettings(
  settings: RoboDogSettings,
  updates: Readonly<Record<string, JsonValue>>
): Result<RoboDogSettings, SettingsError> {
  return parseSettings({ ...toJson(settings), ...updates });
}

/**
 * Sets a nested key, creating (or replacing non-object) intermediate nodes,
 * then re-validates the whole document.
 */
export function applyKeyPath(
  settings: RoboDogSettings,
  keyPath: readonly string[],
  value: JsonValue
): Result<RoboDogSettings, SettingsError> {
  if (keyPath.length === 0) {
    return err({ code: 'SETTINGS_KEY_PATH_EMPTY', message: 'Key path cannot be empty' });
  }

  const data = toJson(settings);
  let target: JsonObject = data;
  for (const part of keyPath.slice(0, -1)) {
    const node = target[part];
    if (isJsonObject(node)) {
      target = node;
    } else {
      const created: JsonObject = {};
      target[part] = created;
      target = created;
    }
  }
  target[keyPath[keyPath.length - 1] ?? ''] = value;

  return parseSettings(data);
}

export function splitKeyPath(raw: string): string[] {
  return raw
    .split('.')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

// =============================================================================
// Typed CLI values
// =============================================================================

export const VALUE_TYPES = ['str', 'int', 'float', 'bool', 'json'] as const;
export type ValueType = (typeof VALUE_TYPES)[number];

const TRUE_WORDS = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_WORDS = new Set(['0', 'false', 'no', 'n', 'off']);

export function parseTypedValue(raw: string, valueType: ValueType): Result<JsonValue, string> {
  switch (valueType) {
    case 'str':
      return ok(raw);
    case 'int': {
      const trimmed = raw.trim();
      return /^[+-]?\d+$/.test(trimmed)
        ? ok(Number.parseInt(trimmed, 10))
        : err(`Cannot parse integer value from '${raw}'`);
    }
    case 'float': {
      const parsed = Number(raw.trim());
      return raw.trim() !== '' && Number.isFinite(parsed) ? ok(parsed) : err(`Cannot parse float value from '${raw}'`);
    }
    case 'bool': {
      const lowered = raw.trim().toLowerCase();
      if (TRUE_WORDS.has(lowered)) return ok(true);
      if (FALSE_WORDS.has(lowered)) return ok(false);
      return err(`Cannot parse boolean value from '${raw}'`);
    }
    case 'json':
      return parseJsonValue(raw);
  }
}

// =============================================================================
// Internal
// =============================================================================

function parseDocument(text: string, format: SettingsFormat, filePath: string): Result<unknown, SettingsError> {
  if (text.trim() === '') return ok({});
  return parseByFormat(text, format).mapErr((message) => ({
    code: 'SETTINGS_PARSE_ERROR' as const,
    message: `${filePath}: ${message}`,
  }));
}

function parseByFormat(text: string, format: SettingsFormat): Result<unknown, string> {
  switch (format) {
    case 'json':
      return parseJsonValue(text);
    case 'yaml':
      return attempt(() => parseYaml(text));
    case 'toml':
      return attempt(() => parseToml(text));
  }
}

function attempt(parse: () => unknown): Result<unknown, string> {
  try {
    return ok(parse());
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

function parseJsonValue(text: string): Result<JsonValue, string> {
  try {
    const value: JsonValue = JSON.parse(text);
    return ok(value);
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

function toJson(settings: RoboDogSettings): JsonObject {
  const round: JsonValue = JSON.parse(JSON.stringify(settings));
  return isJsonObject(round) ? round : {};
}

function withoutNulls(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(withoutNulls);
  if (isJsonObject(value)) {
    const kept: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      if (child !== null) kept[key] = withoutNulls(child);
    }
    return kept;
  }
  return value;
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isJsonObject(value)) {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      const child = value[key];
      if (child !== undefined) sorted[key] = sortKeys(child);
    }
    return sorted;
  }
  return value;
}
