/**
 * Lead-Key Store: which CRM lead a call's unique id already produced
 *
 * One Redis key per unique id, expiring after ttlSeconds. The orchestrator
 * writes the LeadRef as soon as the lead exists (and again once the call
 * note is attached), so a retry or a second delivery of the same call
 * updates instead of duplicating. Each write restarts the expiry; once a
 * key has expired the CRM is searched by the call id instead.
 */

import type { Redis as IORedis } from 'ioredis';
import { LeadRefSchema } from '../crm/types.js';
import type { LeadRef } from '../crm/types.js';

export const LEAD_KEY_PREFIX = 'call-sync:lead:';

const DEFAULT_TTL_SECONDS = 30 * 24 * 60 * 60;

export interface LeadKeyStore {
  get(uniqueId: string): Promise<LeadRef | null>;
  set(uniqueId: string, ref: LeadRef): Promise<void>;
}

export interface RedisLeadKeyStoreOptions {
  ttlSeconds?: number;
  prefix?: string;
}

export function leadKey(uniqueId: string, prefix = LEAD_KEY_PREFIX): string {
  return `${prefix}${uniqueId}`;
}

export class RedisLeadKeyStore implements LeadKeyStore {
  private readonly ttlSeconds: number;
  private readonly prefix: string;

  constructor(
    private readonly redis: IORedis,
    options: RedisLeadKeyStoreOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.prefix = options.prefix ?? LEAD_KEY_PREFIX;
  }

  async get(uniqueId: string): Promise<LeadRef | null> {
    const raw = await this.redis.get(leadKey(uniqueId, this.prefix));
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn('[lead-store] Stored lead ref is not JSON, ignoring', { uniqueId });
      return null;
    }

    const parsed = LeadRefSchema.safeParse(json);
    if (!parsed.success) {
      console.warn('[lead-store] Stored lead ref has an unexpected shape, ignoring', { uniqueId });
      return null;
    }
    return parsed.data;
  }

  async set(uniqueId: string, ref: LeadRef): Promise<void> {
    await this.redis.set(leadKey(uniqueId, this.prefix), JSON.stringify(ref), 'EX', this.ttlSeconds);
  }
}
