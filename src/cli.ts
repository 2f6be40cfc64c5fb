#!/usr/bin/env node
/**
 * vct CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command, InvalidArgumentError } from 'commander';
import pino from 'pino';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { SystemClock } from './runtime/adapters/system-clock.js';
import type { RobotDispatcher } from './application/robot-dispatcher.js';
import { buildBrain } from './application/robot-dispatcher.js';
import { createSimulatedBackends } from './application/backends.js';
import { DEFAULT_SETTINGS_PATH } from './config/app-config.js';
import { loadSettings, saveSettings } from './config/robodog-settings.js';
import { formatAppError } from './errors/formatter.js';
import { createBootstrapLogger } from './core/logging/index.js';
import { noopMetrics } from './infrastructure/metrics/brain-metrics.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeRunCommand,
  executeConfigShowCommand,
  executeConfigSetCommand,
  executeSimulateCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program.name('vct').description('RoboDog trainer: voice commands, behaviour policy and rewards').version('0.14.0');

function parseNumber(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new InvalidArgumentError('Not a number.');
  return value;
}

function configPathOf(options: { config?: string }): string {
  return options.config ?? process.env['VCT_CONFIG'] ?? DEFAULT_SETTINGS_PATH;
}

// Commands that never build the container still need a terminator.
const standaloneTerminator: ProcessTerminator = new NodeProcessTerminator();

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITH DI (mode-aware dispatcher)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('run', { isDefault: true })
  .description('Handle one command (or one recording) and print the result')
  .option('--config <path>', 'RoboDog settings file')
  .option('--cmd <text>', 'command text (default: "сидіти")')
  .option('--wav <path>', 'recording to transcribe instead of --cmd')
  .option('--simulate', 'use the in-process back ends regardless of VCT_SIMULATE')
  .action(async (options: { config?: string; cmd?: string; wav?: string; simulate?: boolean }) => {
    const env = {
      ...process.env,
      ...(options.config ? { VCT_CONFIG: options.config } : {}),
      ...(options.simulate ? { VCT_SIMULATE: '1' } : {}),
    };
    const init = await initializeContainer({
      runtimeMode: { kind: 'cli' },
      env,
      // stdout carries the JSON result.
      logDestination: pino.destination({ dest: 2, sync: true }),
    });
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);

    if (init.kind === 'err') {
      interpretCliResult(failure('Cannot start', { details: formatAppError(init.error).split('\n') }), terminator);
      return;
    }

    const dispatcher = container.resolve<RobotDispatcher>(DI.Services.Dispatcher);
    const result = await executeRunCommand(
      { dispatch: (request) => dispatcher.dispatch(request) },
      { cmd: options.cmd, wav: options.wav }
    );

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITHOUT DI (settings file and offline simulation)
// ═══════════════════════════════════════════════════════════════════════════

const config = program.command('config').description('Inspect or modify the RoboDog settings file');

config
  .command('show')
  .description('Print the validated settings (YAML unless --as-json)')
  .option('--config <path>', 'RoboDog settings file')
  .option('--as-json', 'print JSON instead of YAML')
  .action(async (options: { config?: string; asJson?: boolean }) => {
    const result = await executeConfigShowCommand({ loadSettings }, configPathOf(options), {
      asJson: options.asJson === true,
    });
    interpretCliResult(result, standaloneTerminator);
  });

config
  .command('set <key> <value>')
  .description('Update a dot-separated key (e.g. commands_map.сидіти)')
  .option('--type <type>', 'str | int | float | bool | json', 'str')
  .option('--config <path>', 'RoboDog settings file')
  .action(async (key: string, value: string, options: { type: string; config?: string }) => {
    const result = await executeConfigSetCommand(
      { loadSettings, saveSettings },
      { key, value, type: options.type, configPath: configPathOf(options) }
    );
    interpretCliResult(result, standaloneTerminator);
  });

program
  .command('simulate <commands...>')
  .description('Run a closed-loop episode in the dog environment simulator')
  .option('--config <path>', 'RoboDog settings file')
  .option('--seed <n>', 'simulator seed', parseNumber, 42)
  .option('--confidence <x>', 'recognition confidence 0..1', parseNumber, 0.85)
  .option('--reward-bias <x>', 'reward bias 0..1', parseNumber, 0.5)
  .action(
    async (
      commands: string[],
      options: { config?: string; seed: number; confidence: number; rewardBias: number }
    ) => {
      const logger = createBootstrapLogger('Simulate');
      const clock = new SystemClock();
      const result = await executeSimulateCommand(
        {
          loadSettings,
          createBrain: (settings) =>
            buildBrain(createSimulatedBackends({ logger, clock, write: (line) => logger.info(line) }), {
              settings,
              clock,
              logger,
              metrics: noopMetrics,
            }),
        },
        {
          configPath: configPathOf(options),
          commands,
          seed: options.seed,
          confidence: options.confidence,
          rewardBias: options.rewardBias,
        }
      );
      interpretCliResult(result, standaloneTerminator);
    }
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  createBootstrapLogger('Cli').fatal({ err: error }, 'Unexpected CLI failure');
  standaloneTerminator.terminate({ kind: 'failure' });
});
