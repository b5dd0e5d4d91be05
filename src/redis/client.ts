/**
 * Redis Client Module
 *
 * Singleton ioredis client with graceful degradation. Redis carries the
 * BullMQ queue and a progress mirror for job polling; the in-process job
 * registry stays authoritative, so every Redis failure is logged and
 * swallowed here rather than surfaced to callers.
 *
 * With REDIS_ENABLED=false no client is ever created.
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Configuration
// ============================================

/**
 * Connection settings shared with BullMQ
 */
export function getRedisConnectionOptions(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
  };
}

function getClientOptions(): RedisOptions {
  return {
    ...getRedisConnectionOptions(),
    maxRetriesPerRequest: 1,
    // 100ms, 200ms, 300ms, then give up
    retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 100, 400)),
    lazyConnect: true,
  };
}

// ============================================
// Client State
// ============================================

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

function createRedisClient(): Redis | null {
  try {
    const client = new Redis(getClientOptions());

    client.on('connect', () => {
      isConnected = true;
      logger.info('📦 Redis connected');
    });

    client.on('ready', () => {
      isConnected = true;
    });

    client.on('error', (error: Error) => {
      logger.warn(`Redis error (non-fatal): ${error.message}`);
      isConnected = false;
    });

    client.on('close', () => {
      isConnected = false;
    });

    client.on('end', () => {
      isConnected = false;
      logger.debug('Redis connection ended');
    });

    return client;
  } catch (error) {
    logger.warn(
      `Failed to create Redis client (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return null;
  }
}

/**
 * Whether Redis is configured at all for this process
 */
export function isRedisEnabled(): boolean {
  return env.REDIS_ENABLED;
}

/**
 * Gets the Redis client, connecting on first use.
 *
 * @returns The client, or null when Redis is disabled or could not be created
 */
export function getRedisClient(): Redis | null {
  if (!isRedisEnabled()) {
    return null;
  }

  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();

    redisClient?.connect().catch((error: unknown) => {
      logger.warn(
        `Redis initial connection failed (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      isConnected = false;
    });
  }

  return redisClient;
}

export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Closes the connection during shutdown
 */
export async function disconnectRedis(): Promise<void> {
  if (!redisClient) {
    return;
  }

  try {
    await redisClient.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`);
  } finally {
    redisClient = null;
    isConnected = false;
    connectionAttempted = false;
  }
}

// ============================================
// Safe Redis Operations
// ============================================

/**
 * Runs a Redis read, returning `fallback` when Redis is unavailable or fails
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`);
    return fallback;
  }
}

/**
 * Runs a fire-and-forget Redis write; failures are logged only
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
    },
    undefined,
    operationName
  );
}
