/**
 * Simulate Command
 *
 * Runs a closed-loop episode: the brain reacts to each command and the dog
 * environment reacts to the brain. Always uses the in-process back ends.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { RoboDogSettings, SettingsError } from '../../config/robodog-settings.js';
import type { RoboDogBrain } from '../../domain/brain/robodog-brain.js';
import { DogEnv } from '../../domain/simulation/dog-env.js';
import { settingsFailure } from './settings-failure.js';

export interface SimulateCommandDeps {
  readonly loadSettings: (path: string) => ResultAsync<RoboDogSettings, SettingsError>;
  readonly createBrain: (settings: RoboDogSettings) => RoboDogBrain;
}

export interface SimulateCommandOptions {
  readonly configPath: string;
  readonly commands: readonly string[];
  readonly seed: number;
  readonly confidence: number;
  readonly rewardBias: number;
}

export async function executeSimulateCommand(
  deps: SimulateCommandDeps,
  options: SimulateCommandOptions
): Promise<CliResult> {
  if (options.commands.length === 0) {
    return misuse('At least one command is required', ['vct simulate сидіти лежати "до мене"']);
  }
  for (const [name, value] of [
    ['confidence', options.confidence],
    ['reward-bias', options.rewardBias],
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      return misuse(`--${name} must be a number between 0 and 1`);
    }
  }
  if (!Number.isInteger(options.seed)) {
    return misuse('--seed must be an integer');
  }

  const loaded = await deps.loadSettings(options.configPath);
  if (loaded.isErr()) return settingsFailure(loaded.error, options.configPath);

  const env = new DogEnv(options.seed);
  const report = await env.simulateCommands(deps.createBrain(loaded.value), options.commands, {
    confidence: options.confidence,
    rewardBias: options.rewardBias,
  });

  return success({
    message: `Simulated ${options.commands.length} commands`,
    data: { history: report.history, success_rate: report.successRate, final_state: report.finalState },
  });
}
