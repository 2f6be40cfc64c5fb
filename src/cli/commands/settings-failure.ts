import type { CliResult } from '../types/cli-result.js';
import { failure } from '../types/cli-result.js';
import type { SettingsError } from '../../config/robodog-settings.js';
import { assertNever } from '../../runtime/assert-never.js';

export function settingsFailure(error: SettingsError, configPath: string): CliResult {
  switch (error.code) {
    case 'SETTINGS_NOT_FOUND':
      return failure(error.message, { suggestions: [`Create ${configPath} or pass --config <path>`] });
    case 'SETTINGS_UNSUPPORTED_FORMAT':
      return failure(error.message, {
        exitCode: { kind: 'misuse' },
        suggestions: ['Use a .yaml, .yml, .json or .toml settings file'],
      });
    case 'SETTINGS_INVALID':
      return failure(`Invalid settings in ${configPath}`, {
        details: error.issues.map((issue) => `${issue.path}: ${issue.message}`),
      });
    case 'SETTINGS_KEY_PATH_EMPTY':
      return failure(error.message, { exitCode: { kind: 'misuse' } });
    case 'SETTINGS_PARSE_ERROR':
    case 'SETTINGS_IO_ERROR':
      return failure(error.message);
    default:
      return assertNever(error);
  }
}
