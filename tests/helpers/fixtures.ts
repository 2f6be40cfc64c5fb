import { loadConfig } from '../../src/config/app-config.js';
import type { ValidatedConfig } from '../../src/config/app-config.js';
import { parseSettings } from '../../src/config/robodog-settings.js';
import type { RoboDogSettings } from '../../src/config/robodog-settings.js';
import { createRobotDispatcher } from '../../src/application/robot-dispatcher.js';
import type { RobotDispatcher } from '../../src/application/robot-dispatcher.js';
import type { Logger } from '../../src/core/logging/index.js';
import { noopMetrics } from '../../src/infrastructure/metrics/brain-metrics.js';
import type { MetricsRecorder } from '../../src/infrastructure/metrics/brain-metrics.js';
import { SIMULATE_MODE } from '../../src/runtime/operating-mode.js';
import { FakeLogger } from './FakeLogger.js';
import { ManualClock, createFakeFetch } from './fakes.js';

export const LIVE_ENV = {
  VCT_API_KEY: 'test-secret',
  OPENAI_API_KEY: 'test-openai-key',
  VCT_ACTUATOR_URL: 'http://dispenser.test',
} as const;

export function makeConfig(env: Record<string, string | undefined> = {}): ValidatedConfig {
  const result = loadConfig({ env });
  if (result.kind === 'err') {
    throw new Error(`Test config invalid: ${result.error.issues.map((i) => i.path).join(', ')}`);
  }
  return result.value;
}

/** Linear warm start from the default weights: scores are deterministic. */
export const TEST_SETTINGS_PAYLOAD = {
  reward_cooldown_s: 3,
  weights: { stimulus: 0.4 },
  commands_map: { 'сидіти': 'SIT', sit: 'SIT', 'до мене': 'COME', 'голос': 'BARK' },
  reward_triggers: { SIT: true, COME: true, BARK: false },
};

export function makeSettings(payload: unknown = TEST_SETTINGS_PAYLOAD): RoboDogSettings {
  const result = parseSettings(payload);
  if (result.isErr()) throw new Error(`Test settings invalid: ${result.error.message}`);
  return result.value;
}

export interface SimulatedDispatcherOptions {
  readonly settings?: RoboDogSettings;
  readonly logger?: Logger;
  readonly metrics?: MetricsRecorder;
  readonly write?: (line: string) => void;
}

export function makeSimulatedDispatcher(options: SimulatedDispatcherOptions = {}): RobotDispatcher {
  const created = createRobotDispatcher(SIMULATE_MODE, {
    config: makeConfig({}),
    settings: options.settings ?? makeSettings(),
    fetch: createFakeFetch(),
    clock: new ManualClock(),
    logger: options.logger ?? new FakeLogger().logger,
    metrics: options.metrics ?? noopMetrics,
    write: options.write ?? (() => undefined),
  });
  if (created.kind === 'err') throw new Error(created.error.message);
  return created.value;
}
