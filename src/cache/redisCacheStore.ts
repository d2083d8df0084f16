import { errorMessage } from '../errors';
import { log } from '../log';
import type { CacheReadResult, CacheStore, CacheWriteResult } from './types';

/** The slice of the ioredis client the store needs. */
export interface CacheRedisClient {
  getBuffer(key: string): Promise<Buffer | null>;
  setex(key: string, seconds: number, value: Buffer): Promise<unknown>;
  del(key: string): Promise<number>;
}

export interface RedisCacheStoreOptions {
  timeoutMs: number;
}

class CacheTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`cache ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CacheTimeoutError';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

export class RedisCacheStore implements CacheStore {
  readonly id = 'redis';
  readonly enabled = true;

  constructor(
    private readonly redis: CacheRedisClient,
    private readonly options: RedisCacheStoreOptions,
  ) {}

  async get(key: string): Promise<CacheReadResult> {
    try {
      const value = await this.bounded('get', () => this.redis.getBuffer(key));
      return { ok: true, value };
    } catch (error) {
      log.warn({ event: 'cache_get_failed', err: error, key }, 'cache lookup failed');
      return { ok: false, error: toError(error) };
    }
  }

  async set(key: string, value: Buffer, ttlSeconds: number): Promise<CacheWriteResult> {
    try {
      await this.bounded('set', () => this.redis.setex(key, ttlSeconds, value));
      return { ok: true };
    } catch (error) {
      log.warn({ event: 'cache_set_failed', err: error, key, bytes: value.length }, 'cache store failed');
      return { ok: false, error: toError(error) };
    }
  }

  async delete(key: string): Promise<CacheWriteResult> {
    try {
      await this.bounded('delete', () => this.redis.del(key));
      return { ok: true };
    } catch (error) {
      log.warn({ event: 'cache_delete_failed', err: error, key }, 'cache delete failed');
      return { ok: false, error: toError(error) };
    }
  }

  private bounded<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const { timeoutMs } = this.options;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new CacheTimeoutError(operation, timeoutMs));
      }, timeoutMs);

      run().then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
