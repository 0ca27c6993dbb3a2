import express, { ErrorRequestHandler, Request, Response } from 'express';
import { ZodError } from 'zod';
import { ApiDependencies, createApiRouter } from './routes/api';
import { InvalidVoteError, NotFoundError } from './utils/errors';
import { logger } from './utils/logger';

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', issues: err.issues.map(issue => issue.message) });
    return;
  }
  if (err instanceof InvalidVoteError || err instanceof SyntaxError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  logger.error('Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(deps: ApiDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createApiRouter(deps));

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
