import axios, { AxiosRequestConfig } from 'axios';

import {
  ARCHIVE_COLUMNS,
  ARCHIVE_TABLE,
  MAX_LIMIT,
  MIN_LIMIT,
  SERVER_NOT_NULL_COLUMNS,
  SORT_COLUMN
} from '../config/archive';
import { CatalogConfig } from '../config/env';
import { errorMessage, logInfo, logWarn } from '../observability/logger';
import { FetchError } from '../types/errors';
import { PlanetRecord } from '../types/planet';
import { Result, fail, ok } from '../types/result';

/** The part of an axios instance the client calls. */
export interface HttpGetter {
  get(url: string, config: AxiosRequestConfig): Promise<{ status: number; data: unknown }>;
}

export interface ExoplanetArchiveClientOptions {
  config: Pick<CatalogConfig, 'baseUrl' | 'timeoutMs'>;
  http?: HttpGetter;
}

export interface FetchOptions {
  requestId?: string;
}

export function isValidLimit(limit: number): boolean {
  return Number.isInteger(limit) && limit >= MIN_LIMIT && limit <= MAX_LIMIT;
}

export function buildCatalogQuery(limit: number): string {
  const filters = SERVER_NOT_NULL_COLUMNS.map((column) => `${column} IS NOT NULL`).join(' AND ');
  return [
    `SELECT TOP ${limit}`,
    `  ${ARCHIVE_COLUMNS.join(', ')}`,
    `FROM ${ARCHIVE_TABLE}`,
    `WHERE ${filters}`,
    `ORDER BY ${SORT_COLUMN} ASC`
  ].join('\n');
}

/** Numbers pass through, numeric strings are parsed, anything else is missing. */
export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function toName(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Maps one archive row, or returns null when a required field is missing. */
export function toPlanetRecord(row: Record<string, unknown>): PlanetRecord | null {
  const name = toName(row.pl_name);
  const hostName = toName(row.hostname);
  const planetMassEarth = toFiniteNumber(row.pl_bmasse);
  const orbitalPeriodDays = toFiniteNumber(row.pl_orbper);
  const semiMajorAxisAU = toFiniteNumber(row.pl_orbsmax);
  const eccentricity = toFiniteNumber(row.pl_orbeccen);
  const starMassSolar = toFiniteNumber(row.st_mass);
  const starEffectiveTempK = toFiniteNumber(row.st_teff);

  if (
    name === undefined ||
    hostName === undefined ||
    planetMassEarth === undefined ||
    orbitalPeriodDays === undefined ||
    semiMajorAxisAU === undefined ||
    eccentricity === undefined ||
    starMassSolar === undefined ||
    starEffectiveTempK === undefined
  ) {
    return null;
  }

  const record: PlanetRecord = {
    name,
    hostName,
    planetMassEarth,
    orbitalPeriodDays,
    semiMajorAxisAU,
    eccentricity,
    starMassSolar,
    starEffectiveTempK
  };

  const planetRadiusEarth = toFiniteNumber(row.pl_rade);
  if (planetRadiusEarth !== undefined) {
    record.planetRadiusEarth = planetRadiusEarth;
  }

  return record;
}

export function parseCatalogBody(body: unknown): Result<{ records: PlanetRecord[]; dropped: number }, FetchError> {
  if (!Array.isArray(body)) {
    return fail(new FetchError('Réponse de l\'archive illisible: tableau JSON attendu', 'malformed-body'));
  }

  const records: PlanetRecord[] = [];
  let dropped = 0;
  for (const row of body) {
    const record = isRow(row) ? toPlanetRecord(row) : null;
    if (record) {
      records.push(record);
    } else {
      dropped++;
    }
  }

  return ok({ records, dropped });
}

function toFetchError(err: unknown, timeoutMs: number): FetchError {
  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new FetchError(`Archive injoignable: délai de ${timeoutMs} ms dépassé`, 'timeout', undefined, err);
    }
    if (err.response) {
      const status = err.response.status;
      return new FetchError(`Archive en erreur: HTTP ${status}`, 'http-status', status, err);
    }
    return new FetchError(`Archive injoignable: ${err.message}`, 'network', undefined, err);
  }
  if (err instanceof SyntaxError) {
    return new FetchError(`Réponse de l'archive illisible: ${err.message}`, 'malformed-body', undefined, err);
  }
  return new FetchError(`Archive injoignable: ${errorMessage(err)}`, 'network', undefined, err);
}

/**
 * Client of the NASA Exoplanet Archive TAP `sync` endpoint. Failures are
 * returned as `FetchError` values; nothing is thrown to the caller.
 */
export class ExoplanetArchiveClient {
  private readonly config: Pick<CatalogConfig, 'baseUrl' | 'timeoutMs'>;
  private readonly http: HttpGetter;

  constructor(options: ExoplanetArchiveClientOptions) {
    this.config = options.config;
    this.http = options.http ?? axios.create();
  }

  async fetch(limit: number, options?: FetchOptions): Promise<Result<PlanetRecord[], FetchError>> {
    if (!isValidLimit(limit)) {
      return fail(
        new FetchError(`Limite invalide: ${limit} (entier entre ${MIN_LIMIT} et ${MAX_LIMIT} attendu)`, 'invalid-limit')
      );
    }

    const started = Date.now();
    let body: unknown;
    try {
      const res = await this.http.get(this.config.baseUrl, {
        params: { query: buildCatalogQuery(limit), format: 'json' },
        timeout: this.config.timeoutMs,
        headers: { Accept: 'application/json' }
      });
      if (res.status < 200 || res.status >= 300) {
        const error = new FetchError(`Archive en erreur: HTTP ${res.status}`, 'http-status', res.status);
        logWarn('catalog_fetch_failed', { limit, reason: error.reason, status: res.status, requestId: options?.requestId });
        return fail(error);
      }
      body = res.data;
    } catch (err) {
      const error = toFetchError(err, this.config.timeoutMs);
      logWarn('catalog_fetch_failed', {
        limit,
        reason: error.reason,
        status: error.status,
        requestId: options?.requestId,
        error: error.message
      });
      return fail(error);
    }

    const parsed = parseCatalogBody(body);
    if (!parsed.ok) {
      logWarn('catalog_fetch_failed', { limit, reason: parsed.error.reason, requestId: options?.requestId });
      return parsed;
    }

    const { records, dropped } = parsed.value;
    if (dropped > 0) {
      logInfo('catalog_rows_dropped', { limit, dropped, requestId: options?.requestId });
    }
    logInfo('catalog_fetch', {
      limit,
      rows: records.length,
      responseTimeMs: Date.now() - started,
      requestId: options?.requestId
    });

    return ok(records);
  }
}
