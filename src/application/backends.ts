import type { Logger } from '../core/logging/index.js';
import type { LiveBackendConfig } from '../config/live-prerequisites.js';
import type { Clock } from '../runtime/ports/clock.js';
import type { SpeechRecognizer } from '../engines/speech-recognition.js';
import { OpenAiWhisperStt, RuleBasedStt } from '../engines/speech-recognition.js';
import type { LineWriter, SpeechSynthesizer } from '../engines/speech-synthesis.js';
import { ConsoleTts, OpenAiTts } from '../engines/speech-synthesis.js';
import type { RewardActuator } from '../hardware/reward-actuator.js';
import { HttpRewardActuator, SimulatedActuator } from '../hardware/reward-actuator.js';
import type { FetchLike } from '../infrastructure/http/fetch-client.js';

/** The three collaborators that differ between operating modes. */
export interface RobotBackends {
  readonly recognizer: SpeechRecognizer;
  readonly synthesizer: SpeechSynthesizer;
  readonly actuator: RewardActuator;
}

export interface SimulatedBackendDeps {
  readonly logger: Logger;
  readonly clock: Clock;
  readonly write?: LineWriter;
}

export function createSimulatedBackends(deps: SimulatedBackendDeps): RobotBackends {
  return {
    recognizer: new RuleBasedStt(),
    synthesizer: new ConsoleTts(deps.write),
    actuator: new SimulatedActuator(deps.logger.child({ component: 'SimulatedActuator' }), deps.clock),
  };
}

export interface LiveBackendDeps {
  readonly config: LiveBackendConfig;
  readonly fetch: FetchLike;
  readonly logger: Logger;
  readonly write?: LineWriter;
}

export function createLiveBackends(deps: LiveBackendDeps): RobotBackends {
  const { speech, actuatorUrl } = deps.config;
  return {
    recognizer: new OpenAiWhisperStt(
      { apiKey: speech.apiKey, baseUrl: speech.baseUrl, model: speech.transcriptionModel },
      deps.fetch
    ),
    synthesizer: new OpenAiTts(
      {
        apiKey: speech.apiKey,
        baseUrl: speech.baseUrl,
        voice: speech.voice,
        model: speech.model,
        language: speech.language,
      },
      deps.fetch,
      deps.logger.child({ component: 'OpenAiTts' }),
      new ConsoleTts(deps.write),
      deps.write
    ),
    actuator: new HttpRewardActuator({ baseUrl: actuatorUrl, apiKey: deps.config.apiKey }, deps.fetch),
  };
}
