import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { SynthesisOrchestrator } from '../tts/synthesisOrchestrator';
import type { SynthesisRequest, SynthesisResult } from '../tts/types';

const SynthesizeBodySchema = z.object({
  text: z.string({ required_error: 'text is required' }),
  model: z.string().min(1).nullish(),
  sampleRate: z.number().int().nullish(),
  // accepted for clients of the older snake_case API
  sample_rate: z.number().int().nullish(),
});

export interface SynthesizeRouterOptions {
  allowedUserToken?: string;
}

export function contentTypeFor(sampleRate: number): string {
  return `audio/x-raw; format=S16LE; channels=1; rate=${sampleRate}`;
}

export function parseSynthesizeBody(body: unknown): SynthesisRequest | { detail: string } {
  const parsed = SynthesizeBodySchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join(', ');
    return { detail };
  }

  return {
    text: parsed.data.text,
    modelId: parsed.data.model ?? undefined,
    targetSampleRate: parsed.data.sampleRate ?? parsed.data.sample_rate ?? undefined,
  };
}

function writeAudio(res: Response, result: SynthesisResult): void {
  res.status(200);
  res.setHeader('Content-Type', contentTypeFor(result.sampleRate));
  res.setHeader('Content-Length', String(result.audio.length));
  res.setHeader('X-Model', result.modelId);
  res.setHeader('X-Sample-Rate', String(result.sampleRate));
  res.setHeader('X-Cache', result.cache.toUpperCase());
  res.setHeader('X-Resampling', result.resampled ? 'APPLIED' : 'NONE');
  res.setHeader('X-Total-Time', `${result.durationMs}ms`);
  res.end(result.audio);
}

export function createSynthesizeRouter(
  orchestrator: SynthesisOrchestrator,
  options: SynthesizeRouterOptions = {},
): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    if (options.allowedUserToken && req.header('user-token') !== options.allowedUserToken) {
      res.status(403).json({ detail: 'forbidden' });
      return;
    }

    const request = parseSynthesizeBody(req.body);
    if ('detail' in request) {
      res.status(400).json(request);
      return;
    }

    try {
      const result = await orchestrator.handle(request);
      writeAudio(res, result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
