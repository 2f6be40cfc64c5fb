import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { RoboDogSettings, SettingsError } from '../../config/robodog-settings.js';
import { serializeSettings } from '../../config/robodog-settings.js';
import { settingsFailure } from './settings-failure.js';

export interface ConfigShowCommandDeps {
  readonly loadSettings: (path: string) => ResultAsync<RoboDogSettings, SettingsError>;
}

export interface ConfigShowOptions {
  /** JSON instead of the default YAML rendering. */
  readonly asJson?: boolean;
}

export async function executeConfigShowCommand(
  deps: ConfigShowCommandDeps,
  configPath: string,
  options: ConfigShowOptions = {}
): Promise<CliResult> {
  const loaded = await deps.loadSettings(configPath);
  return loaded.match(
    (settings) => {
      const message = `Settings from ${configPath}`;
      return options.asJson
        ? success({ message, data: settings })
        : success({ message, text: serializeSettings(settings, 'yaml') });
    },
    (error) => settingsFailure(error, configPath)
  );
}
