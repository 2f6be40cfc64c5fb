/**
 * CLI Commands - Public API
 */

export { executeRunCommand, toRunRequest, DEFAULT_RUN_COMMAND, type RunCommandDeps, type RunCommandOptions } from './run.js';
export { executeConfigShowCommand, type ConfigShowCommandDeps } from './config-show.js';
export { executeConfigSetCommand, type ConfigSetCommandDeps, type ConfigSetCommandOptions } from './config-set.js';
export { executeSimulateCommand, type SimulateCommandDeps, type SimulateCommandOptions } from './simulate.js';
