/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Register it in di/container.ts (factory or class)
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Which entry point owns the process (server/cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request event bus */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    /** Wall clock */
    Clock: Symbol('Runtime.Clock'),
    /** fetch used by every network back end */
    Fetch: Symbol('Runtime.Fetch'),
    /** Line writer for console speech output */
    Output: Symbol('Runtime.Output'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
    /** Simulate/live, resolved once at startup */
    OperatingMode: Symbol('Config.OperatingMode'),
    /** RoboDog settings file contents */
    Settings: Symbol('Config.Settings'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** pino logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** prom-client metrics */
    Metrics: Symbol('Infra.Metrics'),
    /** HTTP listener for the API */
    HttpServer: Symbol('Infra.HttpServer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CORE SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Mode-aware robot request dispatcher */
    Dispatcher: Symbol('Services.Dispatcher'),
    /** express application */
    ApiApp: Symbol('Services.ApiApp'),
  },
} as const;
