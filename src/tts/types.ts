import type { VoiceModelFiles } from '../models/types';

export interface VoiceConfig {
  sampleRate: number;
  numSpeakers: number;
  language?: string;
  quality?: string;
}

/** Engine-side state for a loaded voice. Only the engine that produced it reads it. */
export interface ModelHandle {
  readonly engineId: string;
  readonly modelId: string;
  readonly files: VoiceModelFiles;
  readonly voice: VoiceConfig;
}

export interface SynthesisEngine {
  readonly id: string;
  load(modelId: string, files: VoiceModelFiles, voice: VoiceConfig): Promise<ModelHandle>;
  /** Raw s16le mono PCM at `handle.voice.sampleRate`. */
  synthesize(handle: ModelHandle, text: string): Promise<Buffer>;
}

export interface SynthesisRequest {
  readonly text: string;
  readonly modelId?: string;
  readonly targetSampleRate?: number;
}

export type CacheStatus = 'hit' | 'miss' | 'unavailable' | 'disabled';

export interface SynthesisResult {
  audio: Buffer;
  modelId: string;
  sampleRate: number;
  nativeSampleRate?: number;
  cache: CacheStatus;
  resampled: boolean;
  durationMs: number;
}
