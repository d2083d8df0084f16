import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { ModelUnavailableError, errorMessage, type ModelUnavailableReason } from '../errors';
import { SingleFlight } from '../limits/singleFlight';
import { log } from '../log';
import { incModelAcquisition, startStageTimer } from '../metrics';
import type { SynthesisEngine } from '../tts/types';
import { ModelNotFoundError, type ModelSource } from './modelSource';
import {
  voiceModelFiles,
  type ModelState,
  type ReadyVoiceModel,
  type VoiceModel,
  type VoiceModelFiles,
} from './types';
import { readVoiceConfig } from './voiceConfig';

const STAGING_DIR = '.staging';

export interface ModelRegistryOptions {
  assetsDir: string;
  source: ModelSource;
  engine: SynthesisEngine;
  /** Empty means any id is accepted. */
  allowedModels?: readonly string[];
  /** Cap on models resolving or ready at once. */
  maxModels?: number;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Owns the one record per voice id. Records are immutable and replaced on
 * every transition; acquisition (download + load) runs at most once per id at
 * a time, with concurrent callers awaiting the same attempt.
 */
export class ModelRegistry {
  private readonly models = new Map<string, VoiceModel>();
  private readonly acquisitions = new SingleFlight<string, ReadyVoiceModel>();
  private readonly allowed: ReadonlySet<string>;
  private readonly maxModels: number;

  constructor(private readonly options: ModelRegistryOptions) {
    this.allowed = new Set(options.allowedModels ?? []);
    this.maxModels = options.maxModels ?? Number.POSITIVE_INFINITY;
  }

  get assetsDir(): string {
    return this.options.assetsDir;
  }

  get allowedModels(): string[] {
    return [...this.allowed];
  }

  get(modelId: string): VoiceModel | undefined {
    return this.models.get(modelId);
  }

  state(modelId: string): ModelState {
    return this.models.get(modelId)?.state ?? 'unresolved';
  }

  /** The ready record, without triggering acquisition. */
  peek(modelId: string): ReadyVoiceModel | undefined {
    const model = this.models.get(modelId);
    return model?.state === 'ready' ? model : undefined;
  }

  list(): VoiceModel[] {
    return [...this.models.values()];
  }

  async resolve(modelId: string): Promise<ReadyVoiceModel> {
    const current = this.models.get(modelId);
    if (current?.state === 'ready') {
      return current;
    }

    if (this.allowed.size > 0 && !this.allowed.has(modelId)) {
      throw new ModelUnavailableError(
        modelId,
        'not_allowed',
        `Model '${modelId}' not available. Available models: ${[...this.allowed].join(', ')}`,
      );
    }

    if (!this.acquisitions.has(modelId)) {
      // Failed records hold no weights and do not take a slot.
      if (this.residentCount() >= this.maxModels) {
        throw new ModelUnavailableError(
          modelId,
          'capacity',
          `Model '${modelId}' cannot be loaded: limit of ${this.maxModels} models reached`,
        );
      }
      // Claimed before yielding so concurrent resolves of other ids count it.
      const attempts = (current?.attempts ?? 0) + 1;
      this.models.set(modelId, { id: modelId, state: 'resolving', attempts, since: Date.now() });
    }

    return this.acquisitions.run(modelId, () => this.acquire(modelId));
  }

  private residentCount(): number {
    let count = 0;
    for (const model of this.models.values()) {
      if (model.state !== 'failed') {
        count += 1;
      }
    }
    return count;
  }

  private async acquire(modelId: string): Promise<ReadyVoiceModel> {
    const attempts = this.models.get(modelId)?.attempts ?? 1;
    log.info({ event: 'model_resolving', model_id: modelId, attempt: attempts }, 'model resolving');

    const endTimer = startStageTimer('model_acquire', modelId);
    try {
      const files = await this.ensureLocal(modelId);
      const voice = await readVoiceConfig(files.configPath);
      const handle = await this.options.engine.load(modelId, files, voice);

      const ready: ReadyVoiceModel = {
        id: modelId,
        state: 'ready',
        attempts,
        nativeSampleRate: voice.sampleRate,
        handle,
        readyAt: Date.now(),
      };
      this.models.set(modelId, ready);
      incModelAcquisition('ready');
      log.info(
        { event: 'model_ready', model_id: modelId, sample_rate: voice.sampleRate, attempt: attempts },
        'model ready',
      );
      return ready;
    } catch (error) {
      const reason: ModelUnavailableReason = error instanceof ModelNotFoundError ? 'not_found' : 'load_failed';
      const message = errorMessage(error);
      this.models.set(modelId, { id: modelId, state: 'failed', attempts, error: message, failedAt: Date.now() });
      incModelAcquisition('failed');
      log.error({ event: 'model_failed', err: error, model_id: modelId, reason, attempt: attempts }, 'model failed');

      throw new ModelUnavailableError(
        modelId,
        reason,
        reason === 'not_found'
          ? `Model '${modelId}' not found`
          : `Model '${modelId}' could not be loaded: ${message}`,
        { cause: error },
      );
    } finally {
      endTimer();
    }
  }

  private async ensureLocal(modelId: string): Promise<VoiceModelFiles> {
    const files = voiceModelFiles(this.options.assetsDir, modelId);
    if ((await exists(files.modelPath)) && (await exists(files.configPath))) {
      return files;
    }

    const stagingDir = path.join(this.options.assetsDir, STAGING_DIR, `${modelId}.${randomUUID()}`);
    await fs.mkdir(stagingDir, { recursive: true });

    try {
      const staged = voiceModelFiles(stagingDir, modelId);
      log.info({ event: 'model_fetch', model_id: modelId, source: this.options.source.id }, 'model fetch');
      await this.options.source.fetch(modelId, staged);

      // Weights first; a voice counts as present only once its config is there too.
      await fs.rename(staged.modelPath, files.modelPath);
      await fs.rename(staged.configPath, files.configPath);
      return files;
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }
  }
}
