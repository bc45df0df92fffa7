import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';

import { MAX_LIMIT, MIN_LIMIT } from '../config/archive';

const SET_FLAGS = new Set(['1', 'true']);

/**
 * `?refresh=1` style switch. A repeated parameter is set when any of its values
 * is; absent means false.
 */
export const FlagSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => [value ?? []].flat().some((v) => SET_FLAGS.has(v)));

export const LimitSchema = z.coerce.number().int().min(MIN_LIMIT).max(MAX_LIMIT);

/** Query accepted by every route serving a catalog snapshot. */
export const SnapshotQuerySchema = z.object({
  limit: LimitSchema.optional(),
  refresh: FlagSchema
});

export type SnapshotQuery = z.infer<typeof SnapshotQuerySchema>;

/** Manual refresh through `?refresh=1` or the `X-Refresh-Cache` header. */
export function wantsRefresh(req: Request, query: Pick<SnapshotQuery, 'refresh'>): boolean {
  if (query.refresh) return true;
  const header = FlagSchema.safeParse(req.get('x-refresh-cache'));
  return header.success && header.data;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

/** Forwards a rejected handler to the Express error middleware. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
