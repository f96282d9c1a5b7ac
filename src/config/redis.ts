import { createClient } from 'redis';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

type RedisClient = ReturnType<typeof createClient>;

const MAX_PROBE_RECONNECT_ATTEMPTS = 3;
const MAX_RECONNECT_DELAY_MS = 3000;

/**
 * The handful of Redis commands the conversation store needs. Keeping the
 * store on this narrow surface lets tests swap in an in-process fake.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<number>;
  scanKeys(match: string): AsyncIterable<string>;
  ping(): Promise<string>;
  quit(): Promise<void>;
}

export type RedisProbeResult =
  | { available: true; client: KeyValueClient }
  | { available: false; reason: string };

export function toKeyValueClient(client: RedisClient): KeyValueClient {
  return {
    get: (key) => client.get(key),
    set: async (key, value, ttlSeconds) => {
      await client.set(key, value, { EX: ttlSeconds });
    },
    del: (key) => client.del(key),
    scanKeys: (match) => client.scanIterator({ MATCH: match, COUNT: 100 }),
    ping: () => client.ping(),
    quit: async () => {
      await client.quit();
    },
  };
}

export interface ReconnectPolicy {
  strategy: (retries: number) => number | Error;
  /** Called once the startup probe resolves; from then on the client retries indefinitely. */
  settle(): void;
}

/**
 * Gives up after a few attempts while probing so startup can fall back to
 * memory. A client that passed the probe keeps reconnecting with capped backoff.
 */
export function createReconnectPolicy(): ReconnectPolicy {
  let probing = true;
  return {
    strategy: (retries) => {
      if (probing && retries >= MAX_PROBE_RECONNECT_ATTEMPTS) {
        return new Error('Redis reconnect attempts exhausted');
      }
      return Math.min(Math.max(retries, 1) * 100, MAX_RECONNECT_DELAY_MS);
    },
    settle: () => {
      probing = false;
    },
  };
}

/**
 * Connects once and pings. Connection failures are reported in the result
 * rather than thrown so startup can pick a storage backend without try/catch.
 */
export async function probeRedis(url: string, connectTimeoutMs: number): Promise<RedisProbeResult> {
  const reconnect = createReconnectPolicy();
  const client = createClient({
    url,
    socket: {
      connectTimeout: connectTimeoutMs,
      reconnectStrategy: reconnect.strategy,
    },
  });

  client.on('error', (err: Error) => {
    logger.error('Redis error', { error: err.message });
  });

  client.on('connect', () => {
    logger.info('Redis connected');
  });

  try {
    await client.connect();
    await client.ping();
    reconnect.settle();
    return { available: true, client: toKeyValueClient(client) };
  } catch (error) {
    if (client.isOpen) {
      await client.disconnect();
    }
    return { available: false, reason: errorMessage(error) };
  }
}

export async function checkRedisHealth(
  client: KeyValueClient
): Promise<{ status: 'healthy' | 'unhealthy'; error?: string }> {
  try {
    await client.ping();
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: errorMessage(error) };
  }
}
