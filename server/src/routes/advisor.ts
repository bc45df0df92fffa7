import { Request, Response, Router } from 'express';
import { z } from 'zod';

import { AdvisorService } from '../advisor/advisorService';
import { CatalogService } from '../services/catalogService';
import { AdviceError } from '../types/errors';
import { LimitSchema, asyncRoute, describeIssues } from './params';

const AskBodySchema = z.object({
  question: z.string().trim().min(1).max(2000)
});

const ExplainBodySchema = z.object({
  name: z.string().trim().min(1),
  limit: LimitSchema.optional()
});

function sendAdviceError(res: Response, error: AdviceError, requestId?: string): void {
  res.status(502).json({ error: error.message, kind: error.kind, requestId });
}

export function createAdvisorRouter(advisor: AdvisorService, catalog: CatalogService): Router {
  const router = Router();

  router.post(
    '/ask',
    asyncRoute(async (req: Request, res: Response) => {
      const body = AskBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: describeIssues(body.error), requestId: req.requestId });
        return;
      }

      const result = await advisor.ask(body.data.question, { requestId: req.requestId });
      if (!result.ok) {
        sendAdviceError(res, result.error, req.requestId);
        return;
      }
      res.json({ answer: result.value });
    })
  );

  router.post(
    '/explain',
    asyncRoute(async (req: Request, res: Response) => {
      const body = ExplainBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: describeIssues(body.error), requestId: req.requestId });
        return;
      }

      const snapshot = await catalog.getCatalog({ limit: body.data.limit, requestId: req.requestId });
      if (!snapshot.ok) {
        res.status(502).json({ error: snapshot.error.message, kind: snapshot.error.kind, requestId: req.requestId });
        return;
      }

      const record = snapshot.value.records.find((r) => r.name === body.data.name);
      if (!record) {
        res.status(404).json({ error: 'Planète inconnue', requestId: req.requestId });
        return;
      }

      const result = await advisor.explain(record, { requestId: req.requestId });
      if (!result.ok) {
        sendAdviceError(res, result.error, req.requestId);
        return;
      }
      res.json({ planet: record.name, explanation: result.value });
    })
  );

  return router;
}
