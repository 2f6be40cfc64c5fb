import { container, initializeContainer } from '../di/container.js';
import type { ContainerInitOptions } from '../di/container.js';
import { DI } from '../di/tokens.js';
import type { HttpServer } from '../infrastructure/http/http-server.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { getBootstrapLogger } from '../core/logging/index.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import type { OperatingMode } from '../runtime/operating-mode.js';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import type { ShutdownEvent, ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';

export interface RunningServer {
  readonly url: string;
  readonly mode: OperatingMode;
  stop(): Promise<void>;
}

/**
 * Initializes the container and binds the listener. Any startup failure is
 * returned before the port is bound.
 */
export async function startServer(options: ContainerInitOptions = {}): Promise<Result<RunningServer, AppError>> {
  const init = await initializeContainer({ runtimeMode: { kind: 'server' }, ...options });
  if (init.kind === 'err') return init;

  const httpServer = container.resolve<HttpServer>(DI.Infra.HttpServer);
  const mode = container.resolve<OperatingMode>(DI.Config.OperatingMode);

  let url: string;
  try {
    url = await httpServer.start();
  } catch (e) {
    return err(Err.startupFailed('listen', e instanceof Error ? e.message : String(e), { cause: e }));
  }

  installShutdownHook(httpServer);
  return ok({ url, mode, stop: () => httpServer.stop() });
}

// Composition-root shutdown hook:
// signals request shutdown via ShutdownEvents, but only the entrypoint terminates the process.
function installShutdownHook(httpServer: HttpServer): void {
  const shutdownEvents = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);
  const processSignals = container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals);
  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('Shutdown');

  processSignals.on('SIGINT', () => shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGINT' }));
  processSignals.on('SIGTERM', () => shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' }));
  processSignals.on('SIGHUP', () => shutdownEvents.emit({ kind: 'shutdown_requested', signal: 'SIGHUP' }));

  let shutdownStarted = false;
  shutdownEvents.onShutdown((event: ShutdownEvent) => {
    if (shutdownStarted) return;
    shutdownStarted = true;

    void (async () => {
      try {
        logger.info({ signal: event.signal }, 'Shutdown requested; stopping HTTP server');
        await httpServer.stop();
        terminator.terminate({ kind: 'success' });
      } catch (error) {
        logger.error({ err: error }, 'Error while stopping services');
        terminator.terminate({ kind: 'failure' });
      }
    })();
  });
}

/**
 * Entry point body: start, or log the failure and exit with status 1.
 */
export async function runServer(options: ContainerInitOptions = {}): Promise<RunningServer> {
  const started = await startServer(options);
  if (started.kind === 'ok') return started.value;

  getBootstrapLogger().fatal({ error: started.error._tag }, formatAppError(started.error));
  return container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator).terminate({ kind: 'failure' });
}
