/**
 * Dead-Letter Store: call facts the orchestrator gave up on
 *
 * Entries are keyed by unique id in a Redis hash, so parking the same call
 * twice replaces the older entry. Two reasons exist:
 * - transient_exhausted: the CRM kept failing past the retry budget
 * - auth_expired: parked while the CRM token needs a human re-authorization
 *
 * Entries stay until an admin re-drive (or a successful OAuth exchange for
 * auth_expired) gets them through.
 */

import { z } from 'zod';
import type { Redis as IORedis } from 'ioredis';
import { CallFactSchema } from '../calls/types.js';

export const DEAD_LETTER_KEY = 'call-sync:dead-letter';

export const DeadLetterEntrySchema = z.object({
  fact: CallFactSchema,
  reason: z.enum(['transient_exhausted', 'auth_expired']),
  error: z.object({ kind: z.string(), message: z.string() }),
  attempts: z.number().int().nonnegative(),
  parkedAt: z.string(),
});

export type DeadLetterEntry = z.infer<typeof DeadLetterEntrySchema>;
export type DeadLetterReason = DeadLetterEntry['reason'];

export interface DeadLetterStore {
  park(entry: DeadLetterEntry): Promise<void>;
  list(): Promise<DeadLetterEntry[]>;
  get(uniqueId: string): Promise<DeadLetterEntry | null>;
  remove(uniqueId: string): Promise<void>;
  count(): Promise<number>;
}

export class RedisDeadLetterStore implements DeadLetterStore {
  constructor(
    private readonly redis: IORedis,
    private readonly key: string = DEAD_LETTER_KEY,
  ) {}

  async park(entry: DeadLetterEntry): Promise<void> {
    await this.redis.hset(this.key, entry.fact.uniqueId, JSON.stringify(entry));
  }

  /** All parked entries, oldest first */
  async list(): Promise<DeadLetterEntry[]> {
    const all = await this.redis.hgetall(this.key);
    const entries: DeadLetterEntry[] = [];
    for (const [uniqueId, raw] of Object.entries(all)) {
      const entry = decode(uniqueId, raw);
      if (entry) entries.push(entry);
    }
    return entries.sort((a, b) => a.parkedAt.localeCompare(b.parkedAt));
  }

  async get(uniqueId: string): Promise<DeadLetterEntry | null> {
    const raw = await this.redis.hget(this.key, uniqueId);
    return raw === null ? null : decode(uniqueId, raw);
  }

  async remove(uniqueId: string): Promise<void> {
    await this.redis.hdel(this.key, uniqueId);
  }

  async count(): Promise<number> {
    return this.redis.hlen(this.key);
  }
}

function decode(uniqueId: string, raw: string): DeadLetterEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    console.warn('[dead-letter] Entry is not JSON, skipping', { uniqueId });
    return null;
  }
  const parsed = DeadLetterEntrySchema.safeParse(json);
  if (!parsed.success) {
    console.warn('[dead-letter] Entry has an unexpected shape, skipping', { uniqueId });
    return null;
  }
  return parsed.data;
}
