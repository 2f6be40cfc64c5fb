import type { Logger } from '../core/logging/index.js';
import type { AppConfig } from '../config/app-config.js';
import type { RoboDogSettings } from '../config/robodog-settings.js';
import { policyConfig } from '../config/robodog-settings.js';
import { checkLivePrerequisites } from '../config/live-prerequisites.js';
import type { StartupFailedError } from '../errors/app-error.js';
import type { OperatingMode } from '../runtime/operating-mode.js';
import type { Clock } from '../runtime/ports/clock.js';
import type { Result } from '../runtime/result.js';
import { map } from '../runtime/result.js';
import { assertNever } from '../runtime/assert-never.js';
import { BehaviorPolicy } from '../domain/behavior/behavior-policy.js';
import type { ActCommand, ActOutcome } from '../domain/brain/robodog-brain.js';
import { RoboDogBrain } from '../domain/brain/robodog-brain.js';
import type { LineWriter } from '../engines/speech-synthesis.js';
import type { FetchLike } from '../infrastructure/http/fetch-client.js';
import type { CommandSource, MetricsRecorder } from '../infrastructure/metrics/brain-metrics.js';
import type { RobotBackends } from './backends.js';
import { createLiveBackends, createSimulatedBackends } from './backends.js';
import type { RequestHandler } from './dispatch/mode-aware-dispatcher.js';
import { ModeAwareDispatcher } from './dispatch/mode-aware-dispatcher.js';

export type RobotRequest =
  | { readonly kind: 'command'; readonly command: ActCommand; readonly source: CommandSource }
  | { readonly kind: 'audio'; readonly wavPath: string };

export type RobotDispatcher = ModeAwareDispatcher<RobotRequest, ActOutcome>;

export interface RobotDispatcherDeps {
  readonly config: AppConfig;
  readonly settings: RoboDogSettings;
  readonly fetch: FetchLike;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly metrics: MetricsRecorder;
  readonly write?: LineWriter;
}

export function buildBrain(
  backends: RobotBackends,
  deps: Pick<RobotDispatcherDeps, 'settings' | 'clock' | 'logger' | 'metrics'>
): RoboDogBrain {
  return new RoboDogBrain({
    settings: deps.settings,
    policy: new BehaviorPolicy(policyConfig(deps.settings)),
    ...backends,
    clock: deps.clock,
    logger: deps.logger.child({ component: 'RoboDogBrain' }),
    metrics: deps.metrics,
  });
}

export class BrainRequestHandler implements RequestHandler<RobotRequest, ActOutcome> {
  constructor(readonly brain: RoboDogBrain) {}

  handle(request: RobotRequest): Promise<ActOutcome> {
    switch (request.kind) {
      case 'command':
        return this.brain.handleCommand(request.command, request.source);
      case 'audio':
        return this.brain.runOnceFromWav(request.wavPath);
      default:
        return assertNever(request);
    }
  }
}

export function createSimulatedHandler(deps: RobotDispatcherDeps): BrainRequestHandler {
  const backends = createSimulatedBackends({ logger: deps.logger, clock: deps.clock, write: deps.write });
  return new BrainRequestHandler(buildBrain(backends, deps));
}

/** Fails when any live prerequisite is missing; no back end is created then. */
export function createLiveHandler(deps: RobotDispatcherDeps): Result<BrainRequestHandler, StartupFailedError> {
  return map(checkLivePrerequisites(deps.config), (live) => {
    const backends = createLiveBackends({ config: live, fetch: deps.fetch, logger: deps.logger, write: deps.write });
    return new BrainRequestHandler(buildBrain(backends, deps));
  });
}

export function createRobotDispatcher(
  mode: OperatingMode,
  deps: RobotDispatcherDeps
): Result<RobotDispatcher, StartupFailedError> {
  return ModeAwareDispatcher.create<RobotRequest, ActOutcome, StartupFailedError>(mode, {
    simulate: () => createSimulatedHandler(deps),
    live: () => createLiveHandler(deps),
  });
}
