import { promises as fs } from 'fs';
import { z } from 'zod';
import type { VoiceConfig } from '../tts/types';

const PiperVoiceConfigSchema = z
  .object({
    audio: z
      .object({
        sample_rate: z.number().int().positive(),
        quality: z.string().optional(),
      })
      .passthrough(),
    num_speakers: z.number().int().positive().optional(),
    language: z
      .object({
        code: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export function parseVoiceConfig(raw: string, source = 'voice config'): VoiceConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${source}: invalid json`, { cause: error });
  }

  const result = PiperVoiceConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`${source}: ${issues}`);
  }

  return {
    sampleRate: result.data.audio.sample_rate,
    numSpeakers: result.data.num_speakers ?? 1,
    language: result.data.language?.code,
    quality: result.data.audio.quality,
  };
}

export async function readVoiceConfig(configPath: string): Promise<VoiceConfig> {
  const raw = await fs.readFile(configPath, 'utf8');
  return parseVoiceConfig(raw, configPath);
}
