import path from 'path';
import type { ModelHandle } from '../tts/types';

/** Voice ids double as file names under the assets directory. */
export const MODEL_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export type ModelState = 'unresolved' | 'resolving' | 'ready' | 'failed';

export interface VoiceModelFiles {
  modelPath: string;
  configPath: string;
}

export interface ResolvingVoiceModel {
  readonly id: string;
  readonly state: 'resolving';
  readonly attempts: number;
  readonly since: number;
}

export interface ReadyVoiceModel {
  readonly id: string;
  readonly state: 'ready';
  readonly attempts: number;
  readonly nativeSampleRate: number;
  readonly handle: ModelHandle;
  readonly readyAt: number;
}

export interface FailedVoiceModel {
  readonly id: string;
  readonly state: 'failed';
  readonly attempts: number;
  readonly error: string;
  readonly failedAt: number;
}

/** Registry record; an id with no record is `unresolved`. */
export type VoiceModel = ResolvingVoiceModel | ReadyVoiceModel | FailedVoiceModel;

export function voiceModelFiles(dir: string, modelId: string): VoiceModelFiles {
  return {
    modelPath: path.join(dir, `${modelId}.onnx`),
    configPath: path.join(dir, `${modelId}.onnx.json`),
  };
}
