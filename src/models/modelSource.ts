import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { fetch, type Dispatcher, type Response } from 'undici';
import { log } from '../log';
import type { VoiceModelFiles } from './types';

export interface ModelSource {
  readonly id: string;
  /** Writes the voice's model and config files to `destination`. */
  fetch(modelId: string, destination: VoiceModelFiles): Promise<void>;
}

export class ModelNotFoundError extends Error {
  constructor(
    readonly modelId: string,
    message: string,
  ) {
    super(message);
    this.name = 'ModelNotFoundError';
  }
}

export class ModelSourceError extends Error {
  constructor(
    readonly modelId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ModelSourceError';
  }
}

// e.g. en_US-kathleen-low, de_DE-thorsten_emotional-medium
const PIPER_VOICE_ID = /^([a-z]{2,3})_([A-Z]{2})-([A-Za-z0-9_]+)-(x_low|low|medium|high)$/;

export interface PiperVoicePaths {
  model: string;
  config: string;
}

/** Relative paths of a voice in the rhasspy/piper-voices repository layout. */
export function piperVoicePaths(modelId: string): PiperVoicePaths | null {
  const match = PIPER_VOICE_ID.exec(modelId);
  if (!match) {
    return null;
  }
  const [, family, region, dataset, quality] = match;
  const dir = `${family}/${family}_${region}/${dataset}/${quality}`;
  return {
    model: `${dir}/${modelId}.onnx`,
    config: `${dir}/${modelId}.onnx.json`,
  };
}

export interface HttpModelSourceOptions {
  baseUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class HttpModelSource implements ModelSource {
  readonly id = 'http';

  private readonly baseUrl: string;

  constructor(private readonly options: HttpModelSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  async fetch(modelId: string, destination: VoiceModelFiles): Promise<void> {
    const paths = piperVoicePaths(modelId);
    if (!paths) {
      throw new ModelNotFoundError(modelId, `no voice named '${modelId}' in model source`);
    }

    // Config first: it is small and a 404 there avoids pulling the weights.
    await this.download(modelId, `${this.baseUrl}/${paths.config}`, destination.configPath);
    await this.download(modelId, `${this.baseUrl}/${paths.model}`, destination.modelPath);
  }

  private async download(modelId: string, url: string, filePath: string): Promise<void> {
    const startedAt = Date.now();
    let response: Response;

    try {
      response = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        signal: AbortSignal.timeout(this.options.timeoutMs),
        dispatcher: this.options.dispatcher,
      });
    } catch (error) {
      throw new ModelSourceError(modelId, `model download failed: ${url}`, { cause: error });
    }

    if (response.status === 404) {
      await readResponseText(response);
      throw new ModelNotFoundError(modelId, `no voice named '${modelId}' in model source`);
    }

    if (!response.ok || !response.body) {
      const body = await readResponseText(response);
      log.warn({ model_id: modelId, url, status: response.status, body: body.slice(0, 200) }, 'model download rejected');
      throw new ModelSourceError(modelId, `model download failed: ${url} status ${response.status}`);
    }

    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(filePath));
    } catch (error) {
      throw new ModelSourceError(modelId, `model download interrupted: ${url}`, { cause: error });
    }

    log.info(
      {
        event: 'model_file_downloaded',
        model_id: modelId,
        url,
        file_path: filePath,
        duration_ms: Date.now() - startedAt,
      },
      'model file downloaded',
    );
  }
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}
