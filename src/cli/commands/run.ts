/**
 * Run Command
 *
 * Handles one typed command, or one recording, through the dispatcher of the
 * resolved operating mode.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { RobotRequest } from '../../application/robot-dispatcher.js';
import type { ActOutcome } from '../../domain/brain/robodog-brain.js';
import { commandWithDefaults } from '../../domain/brain/robodog-brain.js';

export const DEFAULT_RUN_COMMAND = 'сидіти';

export interface RunCommandDeps {
  readonly dispatch: (request: RobotRequest) => Promise<ActOutcome>;
}

export interface RunCommandOptions {
  readonly cmd?: string;
  readonly wav?: string;
}

export function toRunRequest(options: RunCommandOptions): RobotRequest {
  if (options.wav) return { kind: 'audio', wavPath: options.wav };
  return { kind: 'command', command: commandWithDefaults(options.cmd || DEFAULT_RUN_COMMAND), source: 'cli' };
}

export async function executeRunCommand(deps: RunCommandDeps, options: RunCommandOptions = {}): Promise<CliResult> {
  try {
    const outcome = await deps.dispatch(toRunRequest(options));
    return success({ message: `Action ${outcome.action}`, data: outcome });
  } catch (error) {
    return failure('Command failed', {
      details: [error instanceof Error ? error.message : String(error)],
    });
  }
}
