import { AdvisorService } from '../advisor/advisorService';
import { GeminiTextGenerator, TextGenerator } from '../advisor/textGenerator';
import { RedisStore, TtlCache } from '../cache/ttlCache';
import { AppConfig } from '../config/env';
import { ExoplanetArchiveClient, HttpGetter } from '../nasa/exoplanetArchiveClient';
import { logWarn } from '../observability/logger';
import { PlanetRecord } from '../types/planet';
import { CatalogService } from './catalogService';

export interface ServiceOverrides {
  http?: HttpGetter;
  generator?: TextGenerator | null;
  redis?: RedisStore | null;
}

/** Wires the services from explicit configuration. */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}) {
  const redis = overrides.redis ?? null;

  const catalog = new CatalogService({
    source: new ExoplanetArchiveClient({ config: config.catalog, http: overrides.http }),
    cache: new TtlCache<PlanetRecord[]>({
      namespace: 'catalog:v1',
      ttlMs: config.catalog.cacheTtlMs,
      redis,
      keepExpired: true
    }),
    defaultLimit: config.catalog.defaultLimit,
    retries: config.catalog.retries
  });

  let generator: TextGenerator | null;
  if (overrides.generator !== undefined) {
    generator = overrides.generator;
  } else if (config.advisor.apiKey) {
    generator = new GeminiTextGenerator(config.advisor.apiKey, config.advisor);
  } else {
    logWarn('advisor_disabled', { reason: 'GEMINI_API_KEY manquante' });
    generator = null;
  }

  const advisor = new AdvisorService({
    generator,
    cache: new TtlCache<string>({ namespace: 'advisor:v1', ttlMs: config.advisor.cacheTtlMs, redis })
  });

  return { catalog, advisor };
}
