import { randomUUID } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';

import { logInfo } from './logger';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

function incomingRequestId(req: Request): string | undefined {
  const raw = req.headers['x-request-id'];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim() ? value.trim() : undefined;
}

export function applyRequestTracing(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    const requestId = incomingRequestId(req) ?? randomUUID();
    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      logInfo('http_request', {
        requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started
      });
    });

    next();
  };
}
