import { createServer } from 'http';
import type { Server } from 'http';
import type { Application } from 'express';
import { inject, injectable } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';

const CLOSE_TIMEOUT_MS = 5000;

/**
 * Binds the express app to the configured host and port.
 */
@injectable()
export class HttpServer {
  private server: Server | null = null;
  private baseUrl: string | null = null;
  private readonly logger: Logger;

  constructor(
    @inject(DI.Services.ApiApp) private readonly app: Application,
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('HttpServer');
  }

  /** Resolves to the base URL once the listener is bound. */
  async start(): Promise<string> {
    if (this.baseUrl) return this.baseUrl;
    const { host, port } = this.config.server;

    const server = createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    this.server = server;
    this.baseUrl = `http://${host === '0.0.0.0' ? 'localhost' : host}:${boundPort}`;
    this.logger.info({ host, port: boundPort }, `API listening on ${this.baseUrl}`);
    return this.baseUrl;
  }

  get url(): string | null {
    return this.baseUrl;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve) => {
      const closeTimeout = setTimeout(() => {
        this.logger.warn('Server close timeout after 5s, forcing shutdown');
        server.closeAllConnections();
        resolve();
      }, CLOSE_TIMEOUT_MS);

      server.close(() => {
        clearTimeout(closeTimeout);
        this.logger.info('HTTP server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });

    this.server = null;
    this.baseUrl = null;
  }
}
