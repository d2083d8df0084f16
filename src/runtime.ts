import path from 'path';
import { DisabledCacheStore } from './cache/disabledCacheStore';
import { RedisCacheStore } from './cache/redisCacheStore';
import type { CacheStore } from './cache/types';
import { env, type Env } from './env';
import { log } from './log';
import { HttpModelSource } from './models/modelSource';
import { ModelRegistry } from './models/modelRegistry';
import { closeRedisClient, getRedisClient } from './redis/client';
import { PiperEngine } from './tts/piperEngine';
import { SynthesisOrchestrator } from './tts/synthesisOrchestrator';
import type { SynthesisEngine } from './tts/types';

export interface Runtime {
  engine: SynthesisEngine;
  cache: CacheStore;
  registry: ModelRegistry;
  orchestrator: SynthesisOrchestrator;
  close(): Promise<void>;
}

function createCacheStore(config: Env): CacheStore {
  if (!config.ENABLE_CACHE) {
    log.info({ event: 'cache_disabled' }, 'cache disabled via ENABLE_CACHE=false');
    return new DisabledCacheStore();
  }
  return new RedisCacheStore(getRedisClient(), { timeoutMs: config.CACHE_TIMEOUT_MS });
}

export function createRuntime(config: Env = env): Runtime {
  const engine = new PiperEngine({
    binary: config.PIPER_BINARY,
    timeoutMs: config.PIPER_TIMEOUT_MS,
    lengthScale: config.PIPER_LENGTH_SCALE,
    noiseScale: config.PIPER_NOISE_SCALE,
    speaker: config.PIPER_SPEAKER,
  });

  const registry = new ModelRegistry({
    assetsDir: path.resolve(config.TTS_ASSETS_DIR),
    source: new HttpModelSource({
      baseUrl: config.TTS_MODEL_BASE_URL,
      timeoutMs: config.TTS_MODEL_DOWNLOAD_TIMEOUT_MS,
    }),
    engine,
    allowedModels: config.TTS_ALLOWED_MODELS,
    maxModels: config.TTS_MAX_MODELS,
  });

  const cache = createCacheStore(config);

  const orchestrator = new SynthesisOrchestrator({
    registry,
    engine,
    cache,
    defaultModelId: config.TTS_DEFAULT_MODEL,
    cacheTtlSeconds: config.CACHE_TTL_SECONDS,
    cachePrefix: config.CACHE_PREFIX,
    maxTextLength: config.TTS_MAX_TEXT_LENGTH,
    maxSampleRate: config.TTS_MAX_SAMPLE_RATE,
    coalesceRequests: config.TTS_COALESCE_REQUESTS,
  });

  return {
    engine,
    cache,
    registry,
    orchestrator,
    close: closeRedisClient,
  };
}

/** Resolves the default voice and every allow-listed one; failures are logged, not fatal. */
export async function preloadModels(registry: ModelRegistry, defaultModelId: string): Promise<void> {
  const ids = [...new Set([defaultModelId, ...registry.allowedModels])];
  log.info({ event: 'models_preload', models: ids }, 'preloading models');

  const results = await Promise.allSettled(ids.map((id) => registry.resolve(id)));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      log.warn({ err: result.reason, model_id: ids[index] }, 'model preload failed');
    }
  });
}
