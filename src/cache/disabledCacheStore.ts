import type { CacheReadResult, CacheStore, CacheWriteResult } from './types';

export class DisabledCacheStore implements CacheStore {
  readonly id = 'disabled';
  readonly enabled = false;

  async get(_key: string): Promise<CacheReadResult> {
    return { ok: true, value: null };
  }

  async set(_key: string, _value: Buffer, _ttlSeconds: number): Promise<CacheWriteResult> {
    return { ok: true };
  }

  async delete(_key: string): Promise<CacheWriteResult> {
    return { ok: true };
  }
}
