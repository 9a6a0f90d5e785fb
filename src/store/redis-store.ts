/**
 * Redis Key-Value Store
 *
 * ioredis-backed tier-2 store. The client connects lazily, never queues
 * commands while offline and does not retry on its own; the cache retries
 * by calling `connect()` again on its next operation.
 */

import { Redis, type RedisOptions } from 'ioredis';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { KeyValueStore } from './key-value-store.js';

export interface RedisStoreConfig {
  url: string;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
  /** Keys requested per SCAN round trip */
  scanCount?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const DEFAULT_COMMAND_TIMEOUT_MS = 2000;
const DEFAULT_SCAN_COUNT = 100;

export class RedisKeyValueStore implements KeyValueStore {
  private readonly client: Redis;
  private readonly scanCount: number;
  private pendingConnect: Promise<boolean> | null = null;

  constructor(config: RedisStoreConfig) {
    const options: RedisOptions = {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      commandTimeout: config.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      retryStrategy: () => null,
    };

    this.client = new Redis(config.url, options);
    this.scanCount = config.scanCount ?? DEFAULT_SCAN_COUNT;

    // Without a listener ioredis reports connection errors as unhandled
    this.client.on('error', (error: Error) => {
      logger.debug('Redis client error', { error: error.message });
    });
  }

  async connect(): Promise<boolean> {
    if (this.client.status === 'ready') {
      return true;
    }
    if (!this.pendingConnect) {
      this.pendingConnect = this.establish().finally(() => {
        this.pendingConnect = null;
      });
    }
    return this.pendingConnect;
  }

  async get(key: string): Promise<Buffer | null> {
    return this.client.getBuffer(key);
  }

  async set(key: string, value: Buffer, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async delete(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(...keys);
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const found = new Set<string>();
    let cursor = '0';
    do {
      const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', this.scanCount);
      for (const key of batch) {
        found.add(key);
      }
      cursor = next;
    } while (cursor !== '0');
    return [...found];
  }

  async info(): Promise<Record<string, string>> {
    return parseRedisInfo(await this.client.info());
  }

  async close(): Promise<void> {
    if (this.client.status === 'ready') {
      await this.client.quit();
    } else {
      this.client.disconnect();
    }
  }

  private async establish(): Promise<boolean> {
    try {
      if (this.client.status !== 'connecting' && this.client.status !== 'connect') {
        await this.client.connect();
      }
      await this.client.ping();
      logger.info('Connected to Redis');
      return true;
    } catch (error) {
      logger.warn('Redis connection failed, running without tier-2 cache', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }
}

/**
 * Parse the `INFO` reply into a flat map. Section headers and blank lines
 * are skipped.
 */
export function parseRedisInfo(raw: string): Record<string, string> {
  const info: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    if (line === '' || line.startsWith('#')) continue;
    const sep = line.indexOf(':');
    if (sep <= 0) continue;
    info[line.slice(0, sep)] = line.slice(sep + 1);
  }
  return info;
}
