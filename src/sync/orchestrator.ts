/**
 * Sync Orchestrator
 *
 * Turns one call fact into CRM state:
 *
 *   1. Resolve the counterpart number to a contact (first match wins)
 *   2. Create the lead, or update the one this unique id already produced
 *      (found in the lead-key store, or in the CRM by the call id in its name)
 *   3. Attach the call note once (an existing lead is searched for it first)
 *   4. Upload the recording when one exists (failure is only a warning)
 *
 * Work for the same unique id is serialized, so a PBX hangup and a webhook
 * for the same call cannot race each other into two leads.
 *
 * Failure handling:
 * - CrmTransientError: retried with backoff, then dead-lettered
 * - CrmPermanentError / ValidationError: failed, never retried
 * - AuthExpiredError: parked until the CRM is re-authorized
 */

import { AuthExpiredError, CrmPermanentError, CrmTransientError, ValidationError, errorMessage } from '../errors.js';
import type { CallSyncError, CallSyncErrorKind } from '../errors.js';
import { maskPhone } from '../calls/phone.js';
import type { CallFact } from '../calls/types.js';
import type { UnknownContactPolicy } from '../config.js';
import type { CrmGateway } from '../crm/client.js';
import type { CrmContact, LeadRef, LeadRefLead, RecordingFile } from '../crm/types.js';
import type { TokenState } from '../auth/token-store.js';
import type { DeadLetterEntry, DeadLetterReason, DeadLetterStore } from './dead-letter.js';
import type { LeadKeyStore } from './lead-store.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { RetryPolicy } from './retry-policy.js';

export interface SyncErrorInfo {
  kind: CallSyncErrorKind;
  message: string;
}

export type SkipReason = 'kill_switch' | 'contact_not_found';

export type SyncResult =
  | { outcome: 'synced'; uniqueId: string; leadRef: LeadRef; attempts: number; warnings: string[] }
  | { outcome: 'skipped'; uniqueId: string; reason: SkipReason }
  | { outcome: 'failed'; uniqueId: string; error: SyncErrorInfo; attempts: number }
  | { outcome: 'dead_lettered'; uniqueId: string; error: SyncErrorInfo; attempts: number }
  | { outcome: 'paused'; uniqueId: string; reason: 'auth_expired' };

export interface RedriveFilter {
  uniqueId?: string;
  reason?: DeadLetterReason;
}

export interface SyncOrchestratorOptions {
  crm: CrmGateway;
  leads: LeadKeyStore;
  deadLetters: DeadLetterStore;
  retry: RetryPolicy;
  tokens: { state(): TokenState };
  unknownContactPolicy: UnknownContactPolicy;
  killSwitch: () => boolean;
  /** Finds a recording for calls that do not carry a path */
  locateRecording?: (uniqueId: string) => Promise<string | null>;
  loadRecording: (path: string) => Promise<RecordingFile>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

type AttemptOutcome =
  | { kind: 'synced'; leadRef: LeadRef }
  | { kind: 'skipped'; reason: SkipReason };

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class SyncOrchestrator {
  private readonly mutex = new KeyedMutex();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  handle(fact: CallFact): Promise<SyncResult> {
    return this.mutex.runExclusive(fact.uniqueId, () => this.process(fact));
  }

  /**
   * Re-handle parked entries (all of them, or those matching the filter).
   * An entry is removed only when the new attempt did not park it again.
   */
  async redrive(filter: RedriveFilter = {}): Promise<SyncResult[]> {
    const { deadLetters } = this.options;
    let entries: DeadLetterEntry[];
    if (filter.uniqueId) {
      const entry = await deadLetters.get(filter.uniqueId);
      entries = entry ? [entry] : [];
    } else {
      entries = await deadLetters.list();
    }
    if (filter.reason) {
      entries = entries.filter((e) => e.reason === filter.reason);
    }

    console.log('[sync] Re-driving dead letters', { count: entries.length, ...filter });

    const results: SyncResult[] = [];
    for (const entry of entries) {
      const result = await this.handle(entry.fact);
      if (!stillParked(result)) {
        await deadLetters.remove(entry.fact.uniqueId);
      }
      results.push(result);
    }
    return results;
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private async process(fact: CallFact): Promise<SyncResult> {
    const { uniqueId } = fact;

    if (this.options.killSwitch()) {
      console.log('[sync] Kill switch active, skipping', { uniqueId });
      return { outcome: 'skipped', uniqueId, reason: 'kill_switch' };
    }

    if (this.options.tokens.state() === 'NEEDS_AUTH') {
      await this.park(fact, 'auth_expired', new AuthExpiredError(), 0);
      return { outcome: 'paused', uniqueId, reason: 'auth_expired' };
    }

    const phone = fact.phone;
    if (phone === null) {
      const error = new ValidationError(`Call has no usable phone number: ${fact.phoneError ?? 'number missing'}`);
      console.warn('[sync] Not syncing call', { uniqueId, error: error.message });
      return { outcome: 'failed', uniqueId, error: toInfo(error), attempts: 0 };
    }

    const { retry } = this.options;
    for (let attempt = 1; ; attempt++) {
      console.log('[sync] Attempt', {
        uniqueId,
        source: fact.source,
        attempt,
        maxAttempts: retry.maxAttempts,
        phone: maskPhone(phone),
      });

      const warnings: string[] = [];
      try {
        const outcome = await this.attempt(fact, phone, warnings);
        if (outcome.kind === 'skipped') {
          console.log('[sync] Skipped', { uniqueId, reason: outcome.reason });
          return { outcome: 'skipped', uniqueId, reason: outcome.reason };
        }
        console.log('[sync] Synced', { uniqueId, leadRef: outcome.leadRef, attempt, warnings: warnings.length });
        return { outcome: 'synced', uniqueId, leadRef: outcome.leadRef, attempts: attempt, warnings };
      } catch (err) {
        const error = classify(err);

        if (error instanceof AuthExpiredError) {
          await this.park(fact, 'auth_expired', error, attempt);
          return { outcome: 'paused', uniqueId, reason: 'auth_expired' };
        }

        if (error instanceof CrmTransientError) {
          if (retry.canRetry(attempt)) {
            const delayMs = retry.delayAfter(attempt);
            console.warn('[sync] Transient CRM failure, retrying', { uniqueId, attempt, delayMs, error: error.message });
            await this.sleep(delayMs);
            continue;
          }
          await this.park(fact, 'transient_exhausted', error, attempt);
          return { outcome: 'dead_lettered', uniqueId, error: toInfo(error), attempts: attempt };
        }

        console.error('[sync] Permanent failure, not retrying', { uniqueId, attempt, kind: error.kind, error: error.message });
        return { outcome: 'failed', uniqueId, error: toInfo(error), attempts: attempt };
      }
    }
  }

  private async attempt(fact: CallFact, phone: string, warnings: string[]): Promise<AttemptOutcome> {
    const { crm, leads, unknownContactPolicy } = this.options;
    const stored = await leads.get(fact.uniqueId);

    // An unsorted entry is created once per call; later facts have nothing to add to it
    if (stored?.kind === 'unsorted') {
      return { kind: 'synced', leadRef: stored };
    }

    // A create that timed out may still have been committed by the CRM
    let existing: LeadRefLead | null = stored;
    if (!existing) {
      existing = await crm.findLeadByCallId(fact.uniqueId);
      if (existing) {
        console.log('[sync] Found the lead of an earlier attempt', { uniqueId: fact.uniqueId, leadId: existing.leadId });
        await leads.set(fact.uniqueId, existing);
      }
    }

    let contactId: number;
    if (existing) {
      contactId = existing.contactId;
    } else {
      const contacts = await crm.findContacts(phone);
      if (contacts.length > 1) {
        console.log('[sync] Several contacts share the number, using the first', {
          uniqueId: fact.uniqueId,
          contactIds: contacts.map((c) => c.id),
        });
      }

      let contact: CrmContact | undefined = contacts[0];
      if (!contact) {
        if (unknownContactPolicy === 'skip') {
          return { kind: 'skipped', reason: 'contact_not_found' };
        }
        if (unknownContactPolicy === 'unsorted') {
          const ref = await crm.createUnsorted(fact);
          await leads.set(fact.uniqueId, ref);
          return { kind: 'synced', leadRef: ref };
        }
        contact = await crm.createContact(phone);
        console.log('[sync] Created contact for unknown number', { uniqueId: fact.uniqueId, contactId: contact.id });
      }
      contactId = contact.id;
    }

    let lead = await crm.createOrUpdateLead(fact, contactId, existing ?? undefined);
    await leads.set(fact.uniqueId, lead);

    if (lead.noteId === undefined) {
      const earlier = existing ? await crm.findCallNote(lead, fact.uniqueId) : null;
      const noteId = earlier ?? await crm.addCallNote(lead, fact);
      lead = { ...lead, noteId };
      await leads.set(fact.uniqueId, lead);
    }

    if (!lead.recordingAttached) {
      lead = await this.attachRecording(fact, lead, warnings);
    }

    return { kind: 'synced', leadRef: lead };
  }

  private async attachRecording(fact: CallFact, lead: LeadRefLead, warnings: string[]): Promise<LeadRefLead> {
    const { crm, leads, locateRecording, loadRecording } = this.options;

    const path = fact.recordingPath ?? (locateRecording ? await locateRecording(fact.uniqueId) : null);
    if (!path) {
      console.log('[sync] No recording for call', { uniqueId: fact.uniqueId });
      return lead;
    }

    try {
      const file = await loadRecording(path);
      await crm.attachRecording(lead, file);
    } catch (err) {
      if (err instanceof AuthExpiredError) throw err;
      const message = errorMessage(err);
      console.warn('[sync] Recording not attached', { uniqueId: fact.uniqueId, error: message });
      warnings.push(`recording_unavailable: ${message}`);
      return lead;
    }

    const updated: LeadRefLead = { ...lead, recordingAttached: true };
    await leads.set(fact.uniqueId, updated);
    return updated;
  }

  private async park(fact: CallFact, reason: DeadLetterReason, error: CallSyncError, attempts: number): Promise<void> {
    await this.options.deadLetters.park({
      fact,
      reason,
      error: toInfo(error),
      attempts,
      parkedAt: this.now().toISOString(),
    });
    console.warn('[sync] Parked in dead-letter', { uniqueId: fact.uniqueId, reason, attempts });
  }
}

/** Anything that is not one of the CRM-facing errors is treated as transient */
function classify(err: unknown): AuthExpiredError | CrmTransientError | CrmPermanentError | ValidationError {
  if (
    err instanceof AuthExpiredError ||
    err instanceof CrmTransientError ||
    err instanceof CrmPermanentError ||
    err instanceof ValidationError
  ) {
    return err;
  }
  return new CrmTransientError(`Unexpected sync error: ${errorMessage(err)}`);
}

function toInfo(error: CallSyncError): SyncErrorInfo {
  return { kind: error.kind, message: error.message };
}

function stillParked(result: SyncResult): boolean {
  return (
    result.outcome === 'paused' ||
    result.outcome === 'dead_lettered' ||
    (result.outcome === 'skipped' && result.reason === 'kill_switch')
  );
}
