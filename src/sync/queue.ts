/**
 * BullMQ Queue Configuration
 *
 * Two sync queues so the webhook path cannot starve the PBX path:
 * - call-sync-pbx: finalized sessions handed off by the tracker
 * - call-sync-webhook: calls reported by third-party systems
 *
 * Both use:
 * - Deduplication via jobId (call-{uniqueId}) within the queue
 * - attempts: 1 (retry and dead-lettering are owned by the orchestrator)
 * - 24h completed job retention for the dedup window
 *
 * Uses lazy singletons: no Redis connection is opened at import time.
 */

import { Queue } from 'bullmq';
import { Redis as IORedis } from 'ioredis';
import { appConfig } from '../config.js';
import type { CallFact, CallFactSource } from '../calls/types.js';

export const PBX_QUEUE_NAME = 'call-sync-pbx';
export const WEBHOOK_QUEUE_NAME = 'call-sync-webhook';
export const SYNC_JOB_NAME = 'sync-call';

/** Redis connection config shape for BullMQ */
interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: null;
}

/**
 * Parse a Redis URL into a connection config object.
 * Supports redis:// and rediss:// URL formats.
 */
function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * Create a Redis connection config for BullMQ and the stores.
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

export function syncJobId(uniqueId: string): string {
  // BullMQ reserves ':' in custom job ids
  return `call-${uniqueId.replace(/:/g, '_')}`;
}

const _queues = new Map<string, Queue<CallFact>>();
let _redis: IORedis | null = null;

function getQueue(name: string): Queue<CallFact> {
  let queue = _queues.get(name);
  if (!queue) {
    queue = new Queue<CallFact>(name, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 86400 },
        removeOnFail: { age: 7 * 86400 },
      },
    });
    _queues.set(name, queue);
  }
  return queue;
}

export function getSyncQueue(source: CallFactSource): Queue<CallFact> {
  return getQueue(source === 'pbx' ? PBX_QUEUE_NAME : WEBHOOK_QUEUE_NAME);
}

/**
 * Enqueue a call fact for syncing. A fact whose jobId is still retained in
 * the same queue is ignored by BullMQ (duplicate delivery).
 */
export async function enqueueCallFact(fact: CallFact): Promise<void> {
  const jobId = syncJobId(fact.uniqueId);
  await getSyncQueue(fact.source).add(SYNC_JOB_NAME, fact, { jobId });
  console.log('[queue] Enqueued', { uniqueId: fact.uniqueId, source: fact.source, jobId });
}

/** Shared Redis client for the lead-key and dead-letter stores */
export function getRedis(): IORedis {
  if (!_redis) {
    _redis = new IORedis(createRedisConnection());
  }
  return _redis;
}

/**
 * Close queue and Redis connections for graceful shutdown.
 * Resets the singletons so new connections can be created if needed.
 */
export async function closeQueues(): Promise<void> {
  for (const queue of _queues.values()) {
    await queue.close();
  }
  _queues.clear();
  if (_redis) {
    await _redis.quit();
    _redis = null;
  }
}
