import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { AppContext } from './context';
import { RequestValidationError, StorageWriteFailedError, describeError } from './errors';
import {
  createDiseaseRouter,
  createFilterOptionsRouter,
  createGeoRouter,
  createObservationRouter,
  createSpeciesRouter,
  createVectorSpeciesRouter,
} from './routes';

export function createApp(context: AppContext): Express {
  const app = express();
  const { corsOrigins } = context.config;
  app.use(cors(corsOrigins.length > 0 ? { origin: corsOrigins } : undefined));
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/filter_options', createFilterOptionsRouter(context));
  app.use('/api/geo', createGeoRouter(context));
  app.use('/api/observations', createObservationRouter(context));
  app.use('/api/species', createSpeciesRouter(context));
  app.use('/api/vector-species', createVectorSpeciesRouter(context));
  app.use('/api/diseases', createDiseaseRouter(context));

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestValidationError) {
      res.status(err.status).json({ message: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ message: 'Invalid JSON payload.' });
      return;
    }
    if (err instanceof StorageWriteFailedError) {
      console.error(`[api] ${err.message}`, err.cause);
      res.status(500).json({ message: err.message });
      return;
    }
    console.error(err);
    res.status(500).json({ message: describeError(err) });
  });

  return app;
}
