import crypto from 'crypto';

export const DEFAULT_CACHE_PREFIX = 'tts';

/**
 * Deterministic cache key for a synthesized utterance.
 *
 * Each field is written as `<utf8 byte length>:<bytes>` before hashing, so no
 * choice of model id or text can shift a field boundary. Text is hashed
 * verbatim: case and whitespace are significant.
 */
export function deriveCacheKey(
  modelId: string,
  text: string,
  targetSampleRate: number,
  prefix: string = DEFAULT_CACHE_PREFIX,
): string {
  const hash = crypto.createHash('sha256');
  for (const field of [modelId, text, String(targetSampleRate)]) {
    const bytes = Buffer.from(field, 'utf8');
    hash.update(`${bytes.length}:`);
    hash.update(bytes);
  }
  return `${prefix}:${hash.digest('hex')}`;
}
