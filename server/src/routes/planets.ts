import { Request, Response, Router } from 'express';
import { z } from 'zod';

import { describeHabitability } from '../physics/derivations';
import { CatalogService, CatalogSnapshot } from '../services/catalogService';
import { CatalogStats, catalogStats, defaultCriteria, radialVelocityView, selectHabitable } from '../selection/filters';
import { FilterCriteria } from '../types/planet';
import { SnapshotQuery, SnapshotQuerySchema, asyncRoute, describeIssues, wantsRefresh } from './params';

const RadialVelocityQuerySchema = SnapshotQuerySchema.extend({
  minMass: z.coerce.number().finite().optional(),
  maxMass: z.coerce.number().finite().optional(),
  minPeriod: z.coerce.number().finite().optional(),
  maxPeriod: z.coerce.number().finite().optional(),
  eccentricity: z.coerce.number().min(0).lt(1).default(0)
});

type RadialVelocityQuery = z.infer<typeof RadialVelocityQuerySchema>;

function setCacheHeaders(res: Response, snapshot: CatalogSnapshot): void {
  res.setHeader('X-Catalog-Cache', snapshot.metadata.cacheStatus);
  res.setHeader('X-Catalog-Cache-Age', snapshot.metadata.cacheAgeMs.toString());
  res.setHeader('X-Catalog-Frozen', snapshot.metadata.frozenSnapshot ? '1' : '0');
}

/**
 * Loads the snapshot for the request, answering 502 itself when the archive
 * fails and nothing is cached.
 */
async function loadSnapshot(
  catalog: CatalogService,
  req: Request,
  res: Response,
  query: SnapshotQuery
): Promise<CatalogSnapshot | null> {
  const result = await catalog.getCatalog({
    limit: query.limit,
    forceRefresh: wantsRefresh(req, query),
    requestId: req.requestId
  });

  if (!result.ok) {
    const status = result.error.reason === 'invalid-limit' ? 400 : 502;
    res.status(status).json({ error: result.error.message, kind: result.error.kind, requestId: req.requestId });
    return null;
  }

  setCacheHeaders(res, result.value);
  return result.value;
}

function resolveCriteria(query: RadialVelocityQuery, stats: CatalogStats | null): FilterCriteria {
  const defaults = defaultCriteria(stats, query.eccentricity);
  return {
    massRange: [query.minMass ?? defaults.massRange[0], query.maxMass ?? defaults.massRange[1]],
    periodRange: [query.minPeriod ?? defaults.periodRange[0], query.maxPeriod ?? defaults.periodRange[1]],
    eccentricity: defaults.eccentricity
  };
}

export function createPlanetsRouter(catalog: CatalogService): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (req: Request, res: Response) => {
      const query = SnapshotQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: describeIssues(query.error), requestId: req.requestId });
        return;
      }

      const snapshot = await loadSnapshot(catalog, req, res, query.data);
      if (!snapshot) return;

      res.json({
        metadata: snapshot.metadata,
        stats: catalogStats(snapshot.records),
        planets: snapshot.records
      });
    })
  );

  router.get(
    '/radial-velocity',
    asyncRoute(async (req: Request, res: Response) => {
      const query = RadialVelocityQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: describeIssues(query.error), requestId: req.requestId });
        return;
      }

      const snapshot = await loadSnapshot(catalog, req, res, query.data);
      if (!snapshot) return;

      const stats = catalogStats(snapshot.records);
      const criteria = resolveCriteria(query.data, stats);
      if (criteria.massRange[0] > criteria.massRange[1] || criteria.periodRange[0] > criteria.periodRange[1]) {
        res.status(400).json({
          error: 'Intervalle invalide: min doit être inférieur ou égal à max',
          requestId: req.requestId
        });
        return;
      }

      const entries = radialVelocityView(snapshot.records, criteria);
      // Les bornes d'un catalogue vide sont infinies: rien à renvoyer.
      res.json({
        metadata: snapshot.metadata,
        ...(stats ? { criteria } : {}),
        count: entries.length,
        planets: entries.map(({ record, curve }) => ({ ...record, ...curve }))
      });
    })
  );

  router.get(
    '/habitable',
    asyncRoute(async (req: Request, res: Response) => {
      const query = SnapshotQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: describeIssues(query.error), requestId: req.requestId });
        return;
      }

      const snapshot = await loadSnapshot(catalog, req, res, query.data);
      if (!snapshot) return;

      const habitable = selectHabitable(snapshot.records);
      res.json({
        metadata: snapshot.metadata,
        count: habitable.length,
        planets: habitable.map(({ record, zone }) => ({
          ...record,
          hzInnerAU: zone.innerAU,
          hzOuterAU: zone.outerAU
        }))
      });
    })
  );

  router.get(
    '/:name',
    asyncRoute(async (req: Request, res: Response) => {
      const query = SnapshotQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: describeIssues(query.error), requestId: req.requestId });
        return;
      }

      const snapshot = await loadSnapshot(catalog, req, res, query.data);
      if (!snapshot) return;

      const record = snapshot.records.find((r) => r.name === req.params.name);
      if (!record) {
        res.status(404).json({ error: 'Planète inconnue', requestId: req.requestId });
        return;
      }

      const { zone, inZone } = describeHabitability(record);
      res.json({
        ...record,
        hzInnerAU: zone.innerAU,
        hzOuterAU: zone.outerAU,
        inHabitableZone: inZone
      });
    })
  );

  return router;
}
