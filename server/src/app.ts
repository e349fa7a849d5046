import express from 'express';
import cors from 'cors';
import { ZodError } from 'zod';
import { createDiseaseRouter, type DiseaseRouterDeps } from './routes/diseases';
import { CodingError } from './services/errors';
import { errorOutcome, outcome } from './services/fhir';

export function createApp(deps: DiseaseRouterDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.use('/api/diseases', createDiseaseRouter(deps));

  app.use((_req, res) => {
    res.status(404).json(outcome('error', 'not-found', 'Resource not found'));
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ZodError) {
      const text = err.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ');
      return res.status(400).json(outcome('error', 'invalid', text));
    }
    if (err instanceof CodingError) {
      return res.status(err.status).json(errorOutcome(err));
    }
    // body-parser rejects malformed JSON with a 400 status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      return res.status(400).json(outcome('error', 'invalid', 'Malformed JSON body'));
    }
    console.error('[app] unhandled error', err);
    res.status(500).json(outcome('error', 'exception', err instanceof Error ? err.message : 'Unknown error'));
  });

  return app;
}
