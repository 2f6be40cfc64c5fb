import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import { Err } from '../errors/factories.js';
import type { StartupFailedError } from '../errors/app-error.js';
import type { AppConfig } from './app-config.js';

/**
 * Everything the live back ends need, with the optional fields of
 * `AppConfig` proven present.
 */
export interface LiveBackendConfig {
  readonly apiKey: string;
  readonly speech: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly voice: string;
    readonly model: string;
    readonly language: string | undefined;
    readonly transcriptionModel: string;
  };
  readonly actuatorUrl: string;
}

/**
 * Checks the live-mode prerequisites in one pass and reports every missing
 * variable, not just the first.
 */
export function checkLivePrerequisites(config: AppConfig): Result<LiveBackendConfig, StartupFailedError> {
  const apiKey = config.auth.apiKey;
  const speechKey = config.speech.apiKey;
  const actuatorUrl = config.actuator.url;

  if (apiKey === undefined || speechKey === undefined || actuatorUrl === undefined) {
    const missing = [
      apiKey === undefined ? 'VCT_API_KEY' : null,
      speechKey === undefined ? 'OPENAI_API_KEY' : null,
      actuatorUrl === undefined ? 'VCT_ACTUATOR_URL' : null,
    ].filter((name): name is string => name !== null);

    return err(
      Err.startupFailed('live-prerequisites', 'Live mode requires credentials and back-end endpoints', { missing })
    );
  }

  return ok({
    apiKey,
    speech: { ...config.speech, apiKey: speechKey },
    actuatorUrl,
  });
}
