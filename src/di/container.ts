import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Application } from 'express';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { Clock } from '../runtime/ports/clock.js';
import { SystemClock } from '../runtime/adapters/system-clock.js';
import type { EnvSnapshot, OperatingMode } from '../runtime/operating-mode.js';
import { resolveOperatingMode } from '../runtime/operating-mode.js';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { RoboDogSettings } from '../config/robodog-settings.js';
import { loadSettings } from '../config/robodog-settings.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { LoggerFactoryOptions } from '../core/logging/index.js';
import type { LineWriter } from '../engines/speech-synthesis.js';
import { stdoutWriter } from '../engines/speech-synthesis.js';
import type { FetchLike } from '../infrastructure/http/fetch-client.js';
import { BrainMetrics } from '../infrastructure/metrics/brain-metrics.js';
import { HttpServer } from '../infrastructure/http/http-server.js';
import type { RobotDispatcher } from '../application/robot-dispatcher.js';
import { createRobotDispatcher } from '../application/robot-dispatcher.js';
import { createApiApp } from '../api/app.js';
import { apiKeyPolicyFor } from '../api/security.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<Result<void, AppError>> | null = null;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment snapshot; defaults to `process.env`. Read only here. */
  readonly env?: EnvSnapshot;
  /** Network client for the live back ends; defaults to global fetch. */
  readonly fetch?: FetchLike;
  /** Console speech output; defaults to stdout. */
  readonly output?: LineWriter;
  /** pino destination; defaults to stdout. */
  readonly logDestination?: LoggerFactoryOptions['destination'];
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: EnvSnapshot): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'server' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'server':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

function registerRuntime(options: ContainerInitOptions, env: EnvSnapshot): void {
  const mode = options.runtimeMode ?? detectRuntimeMode(env);
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  // Shutdown event bus is always available (even in tests) but only used when something emits.
  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  if (!container.isRegistered(DI.Runtime.Clock)) {
    container.register<Clock>(DI.Runtime.Clock, { useFactory: instanceCachingFactory((c) => c.resolve(SystemClock)) });
  }
  container.register<FetchLike>(DI.Runtime.Fetch, { useValue: options.fetch ?? ((input, init) => fetch(input, init)) });
  container.register<LineWriter>(DI.Runtime.Output, { useValue: options.output ?? stdoutWriter });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: EnvSnapshot): Result<ValidatedConfig, AppError> {
  // Tests may inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  const configResult = loadConfig({ env });
  if (configResult.kind === 'err') return configResult;

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return configResult;
}

function registerLogging(config: ValidatedConfig, options: ContainerInitOptions): ILoggerFactory {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useValue: new PinoLoggerFactory({ level: config.logging.level, destination: options.logDestination }),
    });
  }
  return container.resolve<ILoggerFactory>(DI.Logging.Factory);
}

/** The only place the mode flag is read. */
function registerOperatingMode(env: EnvSnapshot, loggerFactory: ILoggerFactory): OperatingMode {
  const mode = resolveOperatingMode(env, { notices: loggerFactory.create('OperatingMode') });
  container.register<OperatingMode>(DI.Config.OperatingMode, { useValue: mode });
  return mode;
}

async function registerSettings(config: ValidatedConfig): Promise<Result<RoboDogSettings, AppError>> {
  if (container.isRegistered(DI.Config.Settings)) {
    return ok(container.resolve<RoboDogSettings>(DI.Config.Settings));
  }

  const loaded = await loadSettings(config.paths.settingsFile);
  if (loaded.isErr()) {
    return err(Err.startupFailed('settings', loaded.error.message, { cause: loaded.error }));
  }
  container.register<RoboDogSettings>(DI.Config.Settings, { useValue: loaded.value });
  return ok(loaded.value);
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerDispatcher(
  mode: OperatingMode,
  config: ValidatedConfig,
  settings: RoboDogSettings,
  loggerFactory: ILoggerFactory
): Result<RobotDispatcher, AppError> {
  if (!container.isRegistered(DI.Infra.Metrics)) {
    container.register<BrainMetrics>(DI.Infra.Metrics, {
      useValue: new BrainMetrics({ collectDefaults: mode.kind === 'live' }),
    });
  }

  const dispatcher = createRobotDispatcher(mode, {
    config,
    settings,
    fetch: container.resolve<FetchLike>(DI.Runtime.Fetch),
    clock: container.resolve<Clock>(DI.Runtime.Clock),
    logger: loggerFactory.root,
    metrics: container.resolve<BrainMetrics>(DI.Infra.Metrics),
    write: container.resolve<LineWriter>(DI.Runtime.Output),
  });
  if (dispatcher.kind === 'err') return dispatcher;

  container.register<RobotDispatcher>(DI.Services.Dispatcher, { useValue: dispatcher.value });
  return dispatcher;
}

function registerApi(config: ValidatedConfig, loggerFactory: ILoggerFactory): void {
  const apiLogger = loggerFactory.create('Api');
  if (config.auth.apiKey === undefined) {
    apiLogger.warn('VCT_API_KEY is not set; protected routes are open (simulate mode only)');
  }

  container.register<Application>(DI.Services.ApiApp, {
    useFactory: instanceCachingFactory((c) =>
      createApiApp({
        dispatcher: c.resolve<RobotDispatcher>(DI.Services.Dispatcher),
        metrics: c.resolve<BrainMetrics>(DI.Infra.Metrics),
        apiKey: apiKeyPolicyFor(config.auth.apiKey),
        https: config.server.https,
        logger: apiLogger,
      })
    ),
  });
  container.register(DI.Infra.HttpServer, {
    useFactory: instanceCachingFactory((c) => c.resolve(HttpServer)),
  });
}

async function runInitialization(options: ContainerInitOptions): Promise<Result<void, AppError>> {
  const env = options.env ?? process.env;

  registerRuntime(options, env);

  const config = registerConfig(env);
  if (config.kind === 'err') return config;

  const loggerFactory = registerLogging(config.value, options);
  const mode = registerOperatingMode(env, loggerFactory);

  const settings = await registerSettings(config.value);
  if (settings.kind === 'err') return settings;

  // A live-mode prerequisite failure stops here: no HttpServer is registered.
  const dispatcher = registerDispatcher(mode, config.value, settings.value, loggerFactory);
  if (dispatcher.kind === 'err') return dispatcher;

  registerApi(config.value, loggerFactory);
  loggerFactory.create('DI').debug({ mode: mode.kind }, 'Container initialized');
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Concurrent calls share one initialization; calls after success return
 * immediately. A failed initialization is not retried: entry points exit,
 * tests call `resetContainer()`.
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (initialized) return ok(undefined);
  if (initializationPromise) return initializationPromise;

  initializationPromise = runInitialization(options).then(
    (result) => {
      initialized = result.kind === 'ok';
      return result;
    },
    (error: unknown) => err(Err.unexpected('Container initialization failed', error))
  );
  return initializationPromise;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
