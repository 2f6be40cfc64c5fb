export {
  resolveOperatingMode,
  readModeFlag,
  isSimulate,
  SIMULATE_MODE,
  LIVE_MODE,
  SIMULATE_FLAG,
  type OperatingMode,
  type EnvSnapshot,
  type ModeNoticeSink,
  type ResolveModeOptions,
} from './runtime/operating-mode.js';
export {
  ModeAwareDispatcher,
  type ModeHandlerFactories,
  type RequestHandler,
} from './application/dispatch/mode-aware-dispatcher.js';
export { createRobotDispatcher, type RobotDispatcher, type RobotRequest } from './application/robot-dispatcher.js';
export { loadConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
export { checkLivePrerequisites, type LiveBackendConfig } from './config/live-prerequisites.js';
export {
  loadSettings,
  saveSettings,
  parseSettings,
  policyConfig,
  applyKeyPath,
  parseTypedValue,
  type RoboDogSettings,
  type SettingsError,
} from './config/robodog-settings.js';
export { BehaviorPolicy, type BehaviorDecision } from './domain/behavior/behavior-policy.js';
export type { BehaviorInputs } from './domain/behavior/behavior-inputs.js';
export { RoboDogBrain, type ActCommand, type ActOutcome } from './domain/brain/robodog-brain.js';
export { RewardGuard } from './domain/brain/reward-guard.js';
export { DogEnv, type EpisodeReport } from './domain/simulation/dog-env.js';
export { BrainMetrics } from './infrastructure/metrics/brain-metrics.js';
export { createApiApp, type ApiAppDeps } from './api/app.js';
export { startServer, runServer, type RunningServer } from './api/server.js';
export { initializeContainer, resetContainer } from './di/container.js';
export type { AppError } from './errors/app-error.js';
export { formatAppError } from './errors/formatter.js';
