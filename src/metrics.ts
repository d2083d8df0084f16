import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'piper_tts_gateway_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// synthesis / resample / model_acquire
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds (synthesis, resample, model_acquire)',
  labelNames: ['stage', 'model'] as const,
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 120000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage',
  labelNames: ['stage', 'model'] as const,
  registers: [register],
});

const cacheLookupsTotal = new client.Counter({
  name: `${METRICS_PREFIX}cache_lookups_total`,
  help: 'Audio cache lookups by result (hit, miss, unavailable, disabled)',
  labelNames: ['result'] as const,
  registers: [register],
});

const cacheWriteFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}cache_write_failures_total`,
  help: 'Audio cache writes that failed and were skipped',
  registers: [register],
});

const modelAcquisitionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}model_acquisitions_total`,
  help: 'Voice model acquisitions by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }
  return req.baseUrl || 'unmatched';
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function.
 */
export function startStageTimer(stage: string, model: string | undefined): () => number {
  const start = nowNs();
  const modelLabel = model ?? 'unknown';

  return () => {
    const durationMs = nsToMs(nowNs() - start);
    stageDurationMs.observe({ stage, model: modelLabel }, durationMs);
    return durationMs;
  };
}

export function incStageError(stage: string, model: string | undefined): void {
  stageErrorsTotal.inc({ stage, model: model ?? 'unknown' });
}

export function incCacheLookup(result: string): void {
  cacheLookupsTotal.inc({ result });
}

export function incCacheWriteFailure(): void {
  cacheWriteFailuresTotal.inc();
}

export function incModelAcquisition(outcome: 'ready' | 'failed'): void {
  modelAcquisitionsTotal.inc({ outcome });
}
