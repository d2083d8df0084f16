export type CacheReadResult = { ok: true; value: Buffer | null } | { ok: false; error: Error };

export type CacheWriteResult = { ok: true } | { ok: false; error: Error };

/**
 * Key-value store for synthesized audio. Implementations never throw: backend
 * failures come back as `{ ok: false }` and callers decide how to degrade.
 */
export interface CacheStore {
  readonly id: string;
  readonly enabled: boolean;
  get(key: string): Promise<CacheReadResult>;
  set(key: string, value: Buffer, ttlSeconds: number): Promise<CacheWriteResult>;
  delete(key: string): Promise<CacheWriteResult>;
}
