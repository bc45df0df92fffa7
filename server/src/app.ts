import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';

import { AdvisorService } from './advisor/advisorService';
import { errorMessage, logError } from './observability/logger';
import { applyRequestTracing } from './observability/requestTracing';
import { createAdvisorRouter } from './routes/advisor';
import { createPlanetsRouter } from './routes/planets';
import { CatalogService } from './services/catalogService';

export interface AppServices {
  catalog: CatalogService;
  advisor: AdvisorService;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());
  app.use(express.json());

  app.use('/api/planets', createPlanetsRouter(services.catalog));
  app.use('/api/advisor', createAdvisorRouter(services.advisor, services.catalog));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Corps JSON invalide', requestId: req.requestId });
      return;
    }

    logError('unhandled_error', { requestId: req.requestId, path: req.originalUrl, error: errorMessage(err) });
    res.status(500).json({ error: 'Erreur interne du serveur', requestId: req.requestId });
  });

  return app;
}
