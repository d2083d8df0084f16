import { Router } from 'express';
import type { ModelRegistry } from '../models/modelRegistry';
import type { VoiceModel } from '../models/types';

function describeModel(model: VoiceModel): Record<string, unknown> {
  switch (model.state) {
    case 'ready':
      return { id: model.id, state: model.state, sampleRate: model.nativeSampleRate, attempts: model.attempts };
    case 'failed':
      return { id: model.id, state: model.state, error: model.error, attempts: model.attempts };
    case 'resolving':
      return { id: model.id, state: model.state, attempts: model.attempts };
  }
}

export function createModelsRouter(registry: ModelRegistry, defaultModelId: string): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({
      default: defaultModelId,
      allowed: registry.allowedModels,
      models: registry.list().map(describeModel),
    });
  });

  return router;
}
