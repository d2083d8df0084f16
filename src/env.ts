import dotenv from 'dotenv';
import { z } from 'zod';
import { MODEL_ID_PATTERN } from './models/types';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const commaList = (value: unknown): unknown => {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }
  return value;
};

const EnvSchema = z
  .object({
    PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8181)),
    LOG_LEVEL: z.preprocess(
      emptyToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),
    ALLOWED_USER_TOKEN: z.preprocess(emptyToUndefined, z.string().min(1).optional()),

    ENABLE_CACHE: z.preprocess(stringToBoolean, z.boolean().default(true)),
    REDIS_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    REDIS_HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('localhost')),
    REDIS_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(6379)),
    REDIS_PASSWORD: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    CACHE_TTL_SECONDS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(60 * 60 * 24 * 7),
    ),
    CACHE_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('tts')),
    CACHE_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(250)),

    TTS_DEFAULT_MODEL: z.preprocess(
      emptyToUndefined,
      z.string().regex(MODEL_ID_PATTERN).default('en_US-kathleen-low'),
    ),
    TTS_ALLOWED_MODELS: z.preprocess(
      commaList,
      z.array(z.string().regex(MODEL_ID_PATTERN)).default([]),
    ),
    TTS_MAX_MODELS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8)),
    TTS_ASSETS_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('./assets')),
    TTS_MODEL_BASE_URL: z.preprocess(
      emptyToUndefined,
      z.string().url().default('https://huggingface.co/rhasspy/piper-voices/resolve/v1.0.0'),
    ),
    TTS_MODEL_DOWNLOAD_TIMEOUT_MS: z.preprocess(
      emptyToUndefined,
      z.coerce.number().int().positive().default(120000),
    ),
    TTS_PRELOAD_MODELS: z.preprocess(stringToBoolean, z.boolean().default(true)),
    TTS_MAX_TEXT_LENGTH: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(2000)),
    TTS_MAX_SAMPLE_RATE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(48000)),
    TTS_COALESCE_REQUESTS: z.preprocess(stringToBoolean, z.boolean().default(false)),

    PIPER_BINARY: z.preprocess(emptyToUndefined, z.string().min(1).default('piper')),
    PIPER_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30000)),
    PIPER_LENGTH_SCALE: z.preprocess(emptyToUndefined, z.coerce.number().positive().optional()),
    PIPER_NOISE_SCALE: z.preprocess(emptyToUndefined, z.coerce.number().positive().optional()),
    PIPER_SPEAKER: z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().optional()),
  })
  .superRefine((value, ctx) => {
    if (value.TTS_ALLOWED_MODELS.length > 0 && !value.TTS_ALLOWED_MODELS.includes(value.TTS_DEFAULT_MODEL)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `default model '${value.TTS_DEFAULT_MODEL}' not in allowed models: ${value.TTS_ALLOWED_MODELS.join(', ')}`,
        path: ['TTS_DEFAULT_MODEL'],
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return parsed.data;
}

export function buildRedisUrl(value: Pick<Env, 'REDIS_URL' | 'REDIS_HOST' | 'REDIS_PORT' | 'REDIS_PASSWORD'>): string {
  if (value.REDIS_URL) {
    return value.REDIS_URL;
  }
  const auth = value.REDIS_PASSWORD ? `:${encodeURIComponent(value.REDIS_PASSWORD)}@` : '';
  return `redis://${auth}${value.REDIS_HOST}:${value.REDIS_PORT}`;
}

export const env = parseEnv(process.env);
