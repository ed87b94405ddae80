/**
 * Express App
 * Binds the route handlers to HTTP paths
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createLogger, logError } from '../utils/logger.js';
import { corsMiddleware, requestLogger } from './middleware.js';
import { createRouteHandlers, type ApiResponse, type RouteDeps } from './routes.js';

const log = createLogger('HTTP');

export interface AppOptions {
  corsOrigins?: readonly string[];
  /** JSON body limit; ingestion bodies carry whole documents */
  bodyLimit?: string;
}

type Handler = (req: Request) => Promise<ApiResponse>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req)
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  };
}

export function createApp(deps: RouteDeps, options: AppOptions = {}): express.Express {
  const handlers = createRouteHandlers(deps);
  const app = express();

  app.use(requestLogger);
  app.use(corsMiddleware(options.corsOrigins ?? ['http://localhost:3000']));
  app.use(express.json({ limit: options.bodyLimit ?? '6mb' }));

  app.post('/api/chat', route((req) => handlers.chat(req.body)));
  app.post('/api/context/search', route((req) => handlers.searchContext(req.body)));
  app.post('/api/ingest', route((req) => handlers.ingest(req.body)));
  app.get('/api/config', route(() => handlers.config()));
  app.get('/api/stats', route(() => handlers.stats()));
  app.get(
    '/api/sessions/:sessionId/history',
    route((req) => handlers.sessionHistory(req.params['sessionId'] ?? '', req.query['limit']))
  );
  app.delete(
    '/api/sessions/:sessionId/history',
    route((req) => handlers.clearSessionHistory(req.params['sessionId'] ?? ''))
  );
  app.get('/health', route(() => handlers.health()));
  app.get('/metrics', route(() => handlers.metrics()));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Malformed JSON and anything a handler did not turn into a response
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Invalid JSON body' });
      return;
    }
    logError(log, `Unhandled error on ${req.method} ${req.path}`, error);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
