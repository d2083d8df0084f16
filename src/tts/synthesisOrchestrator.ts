import { convertSampleRate } from '../audio/resample';
import { DEFAULT_CACHE_PREFIX, deriveCacheKey } from '../cache/cacheKey';
import type { CacheStore } from '../cache/types';
import { InvalidRequestError, ModelUnavailableError, SynthesisFailedError } from '../errors';
import { SingleFlight } from '../limits/singleFlight';
import { log, previewText } from '../log';
import { incCacheLookup, incCacheWriteFailure, incStageError, startStageTimer } from '../metrics';
import type { ModelRegistry } from '../models/modelRegistry';
import { MODEL_ID_PATTERN, type ReadyVoiceModel } from '../models/types';
import type { CacheStatus, SynthesisEngine, SynthesisRequest, SynthesisResult } from './types';

export interface SynthesisOrchestratorOptions {
  registry: ModelRegistry;
  engine: SynthesisEngine;
  cache: CacheStore;
  defaultModelId: string;
  cacheTtlSeconds: number;
  maxTextLength: number;
  maxSampleRate: number;
  cachePrefix?: string;
  /** Share one synthesis between identical concurrent cache misses. */
  coalesceRequests?: boolean;
}

interface RenderJob {
  key: string;
  modelId: string;
  text: string;
  targetSampleRate: number;
  model: ReadyVoiceModel | undefined;
  cache: CacheStatus;
  startedAt: number;
}

type RenderedAudio = Omit<SynthesisResult, 'durationMs'>;

export class SynthesisOrchestrator {
  private readonly inflight = new SingleFlight<string, RenderedAudio>();
  private readonly cachePrefix: string;

  constructor(private readonly options: SynthesisOrchestratorOptions) {
    this.cachePrefix = options.cachePrefix ?? DEFAULT_CACHE_PREFIX;
  }

  get defaultModelId(): string {
    return this.options.defaultModelId;
  }

  async handle(request: SynthesisRequest): Promise<SynthesisResult> {
    const startedAt = Date.now();
    this.validate(request);

    const { text } = request;
    const modelId = request.modelId ?? this.options.defaultModelId;

    let model = this.options.registry.peek(modelId);
    let targetSampleRate = request.targetSampleRate;
    if (targetSampleRate === undefined) {
      model = model ?? (await this.resolveModel(modelId));
      targetSampleRate = model.nativeSampleRate;
    }

    const key = deriveCacheKey(modelId, text, targetSampleRate, this.cachePrefix);
    const lookup = await this.options.cache.get(key);

    if (lookup.ok && lookup.value !== null) {
      incCacheLookup('hit');
      log.info(
        {
          event: 'cache_hit',
          model_id: modelId,
          sample_rate: targetSampleRate,
          key,
          text: previewText(text),
          duration_ms: Date.now() - startedAt,
        },
        'cache hit',
      );
      return {
        audio: lookup.value,
        modelId,
        sampleRate: targetSampleRate,
        nativeSampleRate: model?.nativeSampleRate,
        cache: 'hit',
        resampled: false,
        durationMs: Date.now() - startedAt,
      };
    }

    let cache: CacheStatus;
    if (!this.options.cache.enabled) {
      cache = 'disabled';
    } else if (lookup.ok) {
      cache = 'miss';
    } else {
      cache = 'unavailable';
      log.warn(
        { event: 'cache_degraded', err: lookup.error, model_id: modelId, key },
        'cache unavailable, synthesizing without it',
      );
    }
    incCacheLookup(cache);

    const job: RenderJob = { key, modelId, text, targetSampleRate, model, cache, startedAt };
    const rendered = this.options.coalesceRequests
      ? await this.inflight.run(key, () => this.render(job))
      : await this.render(job);

    return { ...rendered, durationMs: Date.now() - startedAt };
  }

  private validate(request: SynthesisRequest): void {
    if (typeof request.text !== 'string' || request.text.trim() === '') {
      throw new InvalidRequestError('text', 'text must not be empty');
    }
    if (request.text.length > this.options.maxTextLength) {
      throw new InvalidRequestError(
        'text',
        `text exceeds maximum length of ${this.options.maxTextLength} characters`,
      );
    }
    if (request.modelId !== undefined && !MODEL_ID_PATTERN.test(request.modelId)) {
      throw new InvalidRequestError('model', `invalid model id '${request.modelId}'`);
    }
    const rate = request.targetSampleRate;
    if (rate !== undefined && (!Number.isInteger(rate) || rate <= 0 || rate > this.options.maxSampleRate)) {
      throw new InvalidRequestError(
        'sampleRate',
        `sample rate must be an integer between 1 and ${this.options.maxSampleRate}`,
      );
    }
  }

  private async resolveModel(modelId: string): Promise<ReadyVoiceModel> {
    try {
      return await this.options.registry.resolve(modelId);
    } catch (error) {
      if (error instanceof ModelUnavailableError) {
        throw error;
      }
      throw new ModelUnavailableError(modelId, 'load_failed', `Model '${modelId}' could not be loaded`, {
        cause: error,
      });
    }
  }

  private async render(job: RenderJob): Promise<RenderedAudio> {
    const model = job.model ?? (await this.resolveModel(job.modelId));
    const native = model.nativeSampleRate;

    const endSynthesis = startStageTimer('synthesis', job.modelId);
    let pcm: Buffer;
    try {
      pcm = await this.options.engine.synthesize(model.handle, job.text);
    } catch (error) {
      incStageError('synthesis', job.modelId);
      log.error({ event: 'synthesis_failed', err: error, model_id: job.modelId }, 'tts synthesis failed');
      throw new SynthesisFailedError(job.modelId, 'Audio synthesis failed', { cause: error });
    }
    const synthesisMs = endSynthesis();

    if (pcm.length === 0) {
      incStageError('synthesis', job.modelId);
      throw new SynthesisFailedError(job.modelId, 'Audio synthesis produced no audio');
    }

    let audio = pcm;
    let resampleMs = 0;
    const resampled = job.targetSampleRate !== native;
    if (resampled) {
      const endResample = startStageTimer('resample', job.modelId);
      try {
        audio = convertSampleRate(pcm, native, job.targetSampleRate);
      } catch (error) {
        incStageError('resample', job.modelId);
        throw new SynthesisFailedError(job.modelId, 'Audio resampling failed', { cause: error });
      }
      resampleMs = endResample();
    }

    if (job.cache !== 'disabled') {
      const write = await this.options.cache.set(job.key, audio, this.options.cacheTtlSeconds);
      if (!write.ok) {
        incCacheWriteFailure();
        log.warn(
          { event: 'cache_write_skipped', err: write.error, model_id: job.modelId, key: job.key },
          'cache write failed, serving uncached audio',
        );
      }
    }

    log.info(
      {
        event: 'synthesis_complete',
        model_id: job.modelId,
        text: previewText(job.text),
        native_sample_rate: native,
        sample_rate: job.targetSampleRate,
        bytes: audio.length,
        cache: job.cache,
        synthesis_ms: Math.round(synthesisMs),
        resample_ms: Math.round(resampleMs),
        total_ms: Date.now() - job.startedAt,
      },
      'synthesis complete',
    );

    return {
      audio,
      modelId: job.modelId,
      sampleRate: job.targetSampleRate,
      nativeSampleRate: native,
      cache: job.cache,
      resampled,
    };
  }

  /** Drops a cached utterance so the next request re-synthesizes it. */
  async invalidate(modelId: string, text: string, sampleRate: number): Promise<boolean> {
    const key = deriveCacheKey(modelId, text, sampleRate, this.cachePrefix);
    const result = await this.options.cache.delete(key);
    return result.ok;
  }
}
