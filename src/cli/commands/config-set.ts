/**
 * Config Set Command
 *
 * Updates one dot-separated key of the settings file, re-validates the whole
 * document and writes it back.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { successMessage, misuse } from '../types/cli-result.js';
import type { RoboDogSettings, SettingsError, ValueType } from '../../config/robodog-settings.js';
import { VALUE_TYPES, applyKeyPath, parseTypedValue, splitKeyPath } from '../../config/robodog-settings.js';
import { settingsFailure } from './settings-failure.js';

export interface ConfigSetCommandDeps {
  readonly loadSettings: (path: string) => ResultAsync<RoboDogSettings, SettingsError>;
  readonly saveSettings: (path: string, settings: RoboDogSettings) => ResultAsync<void, SettingsError>;
}

export interface ConfigSetCommandOptions {
  readonly key: string;
  readonly value: string;
  readonly type: string;
  readonly configPath: string;
}

function isValueType(raw: string): raw is ValueType {
  return VALUE_TYPES.some((type) => type === raw);
}

export async function executeConfigSetCommand(
  deps: ConfigSetCommandDeps,
  options: ConfigSetCommandOptions
): Promise<CliResult> {
  if (!isValueType(options.type)) {
    return misuse(`Unsupported value type: ${options.type}`, [`Use one of: ${VALUE_TYPES.join(', ')}`]);
  }
  const value = parseTypedValue(options.value, options.type);
  if (value.isErr()) {
    return misuse(value.error);
  }

  const saved = await deps
    .loadSettings(options.configPath)
    .andThen((settings) => applyKeyPath(settings, splitKeyPath(options.key), value.value))
    .andThen((updated) => deps.saveSettings(options.configPath, updated));

  return saved.match(
    () => successMessage(`Updated ${options.key} in ${options.configPath}`),
    (error) => settingsFailure(error, options.configPath)
  );
}
