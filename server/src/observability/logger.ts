import pino from 'pino';

export type LogFields = Record<string, unknown>;

const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'exoplanet-rv-lab' },
  timestamp: pino.stdTimeFunctions.isoTime
});

export function logInfo(event: string, fields: LogFields = {}): void {
  logger.info({ event, ...fields });
}

export function logWarn(event: string, fields: LogFields = {}): void {
  logger.warn({ event, ...fields });
}

export function logError(event: string, fields: LogFields = {}): void {
  logger.error({ event, ...fields });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
