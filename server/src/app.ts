import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import { ZodError } from 'zod';
import { loadScoringConfig, type ScoringConfig } from '../../lib/config';
import { ScoringError } from '../../lib/errors';
import { createLogger } from '../../lib/logger';
import type { RandomSource } from '../../lib/scoring';
import { createRouter } from './routes';

const log = createLogger('server');

export type AppOptions = {
  config?: ScoringConfig;
  random?: RandomSource;
};

// Error handler LAST
const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'Invalid payload', details: err.issues });
    return;
  }
  if (err instanceof ScoringError) {
    res.status(400).json({ error: err.message, type: err.name });
    return;
  }
  // malformed JSON bodies from body-parser
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  log.error('EXPRESS ERROR:', err);
  res.status(500).json({
    error: 'Internal Server Error',
    message: err instanceof Error ? err.message : String(err),
  });
};

export function createApp({ config = loadScoringConfig(), random }: AppOptions = {}) {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.options('*', cors({ origin: true, credentials: true }));
  app.use(bodyParser.json());

  app.use('/api', createRouter({ config, random }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use(errorHandler);

  return app;
}
