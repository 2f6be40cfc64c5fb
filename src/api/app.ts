import express from 'express';
import type { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { randomUUID } from 'crypto';
import type { Logger } from '../core/logging/index.js';
import { runWithCorrelationId } from '../core/logging/index.js';
import type { HttpsPolicy } from '../config/app-config.js';
import { toConfigIssues } from '../config/app-config.js';
import type { RobotDispatcher } from '../application/robot-dispatcher.js';
import type { BrainMetrics } from '../infrastructure/metrics/brain-metrics.js';
import type { ApiKeyPolicy } from './security.js';
import { requireApiKey } from './security.js';
import { ActInputSchema } from './schemas.js';

export const ACT_ENDPOINT = '/robot/act';
export const HEALTH_ENDPOINT = '/health';
export const METRICS_ENDPOINT = '/metrics';
/** Metrics label for every path without a route, so unknown URLs add no series. */
export const UNMATCHED_ENDPOINT = 'unmatched';

const ROUTED_ENDPOINTS: ReadonlySet<string> = new Set([ACT_ENDPOINT, HEALTH_ENDPOINT, METRICS_ENDPOINT]);
export const REQUEST_ID_HEADER = 'X-Request-ID';

export interface ApiAppDeps {
  readonly dispatcher: RobotDispatcher;
  readonly metrics: BrainMetrics;
  readonly apiKey: ApiKeyPolicy;
  readonly https: HttpsPolicy;
  readonly logger: Logger;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Runs the handler with the request id as the logging correlation id. */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = res.get(REQUEST_ID_HEADER) ?? randomUUID();
    runWithCorrelationId(requestId, () => handler(req, res)).catch(next);
  };
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Builds the express application. It holds no server socket; `HttpServer`
 * binds it, tests drive it through supertest.
 */
export function createApiApp(deps: ApiAppDeps): Application {
  const { dispatcher, metrics, logger } = deps;
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const requestId = req.get(REQUEST_ID_HEADER) || randomUUID();
    res.set(REQUEST_ID_HEADER, requestId);
    next();
  });

  app.use((req, res, next) => {
    const endpoint = ROUTED_ENDPOINTS.has(req.path) ? req.path : UNMATCHED_ENDPOINT;
    const started = process.hrtime.bigint();
    res.once('finish', () => {
      metrics.recordApiRequest(endpoint, req.method, res.statusCode);
      if (endpoint === ACT_ENDPOINT) {
        metrics.observeCommandLatency(endpoint, Number(process.hrtime.bigint() - started) / 1e9);
      }
    });
    next();
  });

  if (deps.https.kind === 'redirect_to_https') {
    // req.protocol honours X-Forwarded-Proto from a terminating proxy.
    app.set('trust proxy', true);
    app.use((req, res, next) => {
      if (req.protocol === 'https') return next();
      res.redirect(307, `https://${req.get('host') ?? 'localhost'}${req.originalUrl}`);
    });
  }

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-API-Key', REQUEST_ID_HEADER],
      exposedHeaders: [REQUEST_ID_HEADER],
    })
  );
  app.use(express.json());

  const protect = requireApiKey(deps.apiKey);

  app.get(HEALTH_ENDPOINT, (_req, res) => {
    res.json({ status: 'ok', mode: dispatcher.mode.kind, simulate: dispatcher.mode.kind === 'simulate' });
  });

  app.post(
    ACT_ENDPOINT,
    protect,
    asyncRoute(async (req, res) => {
      const parsed = ActInputSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(422).json({ detail: 'Invalid request body', issues: toConfigIssues(parsed.error) });
        return;
      }
      const result = await dispatcher.dispatch({ kind: 'command', command: parsed.data, source: 'api' });
      res.json({ ok: true, result });
    })
  );

  app.get(
    METRICS_ENDPOINT,
    protect,
    asyncRoute(async (_req, res) => {
      res.set('Content-Type', metrics.contentType).send(await metrics.render());
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json({ detail: 'Malformed JSON body' });
      return;
    }
    logger.error({ err: error }, 'Unhandled exception in API request');
    res.status(500).json({ detail: 'Internal server error' });
  });

  return app;
}
