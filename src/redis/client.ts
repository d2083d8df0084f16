import Redis from 'ioredis';
import { buildRedisUrl, env } from '../env';
import { log } from '../log';

export type RedisClient = Redis;

let singleton: Redis | null = null;

export function createRedisClient(url: string = buildRedisUrl(env)): Redis {
  // Commands fail fast while disconnected; the cache is optional.
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    enableOfflineQueue: false,
    commandTimeout: env.CACHE_TIMEOUT_MS,
  });

  client.on('connect', () => {
    log.info({ event: 'redis_connect' }, 'redis connect');
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('error', (error) => {
    log.error({ err: error }, 'redis error');
  });

  client.on('end', () => {
    log.warn({ event: 'redis_end' }, 'redis connection ended');
  });

  return client;
}

export function getRedisClient(): Redis {
  if (!singleton) {
    singleton = createRedisClient();
  }

  return singleton;
}

export function setRedisClient(client: Redis | null): void {
  singleton = client;
}

export async function closeRedisClient(): Promise<void> {
  if (!singleton) {
    return;
  }
  const client = singleton;
  singleton = null;
  try {
    await client.quit();
  } catch (error) {
    log.warn({ err: error }, 'redis quit failed');
    client.disconnect();
  }
}
