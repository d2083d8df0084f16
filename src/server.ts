import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { TtsError } from './errors';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import type { ModelRegistry } from './models/modelRegistry';
import { healthRouter } from './routes/health';
import { createModelsRouter } from './routes/models';
import { createSynthesizeRouter } from './routes/synthesize';
import type { SynthesisOrchestrator } from './tts/synthesisOrchestrator';

const JSON_BODY_LIMIT = '256kb';

export interface ServerDeps {
  orchestrator: SynthesisOrchestrator;
  registry: ModelRegistry;
  allowedUserToken?: string;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  next();
}

function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof TtsError) {
    const level = err.status >= 500 ? 'error' : 'warn';
    log[level]({ err, code: err.code, path: req.path }, 'request failed');
    res.status(err.status).json({ detail: err.message });
    return;
  }

  if (isBodyParserError(err) && err.status < 500) {
    res.status(err.status).json({ detail: err.type === 'entity.too.large' ? 'request body too large' : 'invalid json body' });
    return;
  }

  log.error({ err }, 'unhandled error');
  res.status(500).json({ detail: 'internal_server_error' });
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(metricsMiddleware);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(requestIdMiddleware);

  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/models', createModelsRouter(deps.registry, deps.orchestrator.defaultModelId));
  const synthesizeRouter = createSynthesizeRouter(deps.orchestrator, { allowedUserToken: deps.allowedUserToken });
  app.use('/synthesize', synthesizeRouter);
  // path used by clients of the older snake_case API
  app.use('/synthesizeSpeech', synthesizeRouter);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'not found' });
  });
  app.use(errorHandler);

  const server = http.createServer(app);

  return { app, server };
}
