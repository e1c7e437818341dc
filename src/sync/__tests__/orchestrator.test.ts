/**
 * Sync Orchestrator Tests
 *
 * The CRM gateway is a vi.fn fake; lead-key and dead-letter stores are
 * in-memory implementations of the store interfaces. sleep is stubbed so
 * backoff delays are asserted rather than waited for.
 *
 * Tests cover:
 * - Happy path: contact -> lead -> note, lead ref persisted
 * - Idempotency: same unique id from PBX and webhook yields one lead, one note
 * - Unknown-contact policies (skip, unsorted, create_contact)
 * - Retry with backoff, dead-lettering, permanent failures
 * - Auth expiry pauses and parks; kill switch; unusable numbers
 * - Recording attachment and its warnings
 * - Re-drive of dead letters
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { SyncOrchestrator } from '../orchestrator.js';
import type { SyncOrchestratorOptions } from '../orchestrator.js';
import { RetryPolicy } from '../retry-policy.js';
import type { DeadLetterEntry, DeadLetterStore } from '../dead-letter.js';
import type { LeadKeyStore } from '../lead-store.js';
import type { CrmGateway } from '../../crm/client.js';
import type { CrmContact, LeadRef, RecordingFile } from '../../crm/types.js';
import type { TokenState } from '../../auth/token-store.js';
import type { CallFact } from '../../calls/types.js';
import {
  AuthExpiredError,
  CrmPermanentError,
  CrmTransientError,
  RecordingUnavailableError,
} from '../../errors.js';

// ============================================================================
// Fakes
// ============================================================================

class MemoryLeadStore implements LeadKeyStore {
  readonly refs = new Map<string, LeadRef>();

  async get(uniqueId: string): Promise<LeadRef | null> {
    return this.refs.get(uniqueId) ?? null;
  }

  async set(uniqueId: string, ref: LeadRef): Promise<void> {
    this.refs.set(uniqueId, ref);
  }
}

class MemoryDeadLetters implements DeadLetterStore {
  readonly entries = new Map<string, DeadLetterEntry>();

  async park(entry: DeadLetterEntry): Promise<void> {
    this.entries.set(entry.fact.uniqueId, entry);
  }

  async list(): Promise<DeadLetterEntry[]> {
    return [...this.entries.values()];
  }

  async get(uniqueId: string): Promise<DeadLetterEntry | null> {
    return this.entries.get(uniqueId) ?? null;
  }

  async remove(uniqueId: string): Promise<void> {
    this.entries.delete(uniqueId);
  }

  async count(): Promise<number> {
    return this.entries.size;
  }
}

const IVAN: CrmContact = { id: 11, name: 'Ivan Petrov', phones: ['79991234567'] };

function fakeCrm() {
  return {
    ensureValidToken: vi.fn<CrmGateway['ensureValidToken']>().mockResolvedValue(undefined),
    findContacts: vi.fn<CrmGateway['findContacts']>().mockResolvedValue([IVAN]),
    createContact: vi.fn<CrmGateway['createContact']>().mockResolvedValue({ id: 77, name: '+79991234567', phones: ['79991234567'] }),
    createUnsorted: vi.fn<CrmGateway['createUnsorted']>().mockResolvedValue({ kind: 'unsorted', uid: 'unsorted-abc' }),
    createOrUpdateLead: vi.fn<CrmGateway['createOrUpdateLead']>(
      async (_fact, contactId, existing) => existing ?? { kind: 'lead', leadId: 500, contactId },
    ),
    findLeadByCallId: vi.fn<CrmGateway['findLeadByCallId']>().mockResolvedValue(null),
    addCallNote: vi.fn<CrmGateway['addCallNote']>().mockResolvedValue(900),
    findCallNote: vi.fn<CrmGateway['findCallNote']>().mockResolvedValue(null),
    attachRecording: vi.fn<CrmGateway['attachRecording']>().mockResolvedValue(undefined),
  } satisfies CrmGateway;
}

function makeFact(overrides: Partial<CallFact> = {}): CallFact {
  return {
    uniqueId: '1709373600.42',
    source: 'pbx',
    phone: '79991234567',
    rawPhone: '+79991234567',
    direction: 'inbound',
    status: 'ANSWERED',
    durationSeconds: 120,
    startedAt: '2026-03-02T10:00:00.000Z',
    endedAt: '2026-03-02T10:02:05.000Z',
    abandoned: false,
    ...overrides,
  };
}

const recording: RecordingFile = { name: 'in-1709373600.42.wav', contentType: 'audio/wav', data: Buffer.from('RIFF') };

// ============================================================================
// Tests
// ============================================================================

describe('SyncOrchestrator', () => {
  let crm: ReturnType<typeof fakeCrm>;
  let leads: MemoryLeadStore;
  let deadLetters: MemoryDeadLetters;
  let tokenState: TokenState;
  let killSwitch: boolean;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let loadRecording: Mock<(path: string) => Promise<RecordingFile>>;
  let locateRecording: Mock<(uniqueId: string) => Promise<string | null>>;

  const createOrchestrator = (overrides: Partial<SyncOrchestratorOptions> = {}) =>
    new SyncOrchestrator({
      crm,
      leads,
      deadLetters,
      retry: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 }),
      tokens: { state: () => tokenState },
      unknownContactPolicy: 'skip',
      killSwitch: () => killSwitch,
      locateRecording,
      loadRecording,
      sleep,
      now: () => new Date('2026-03-02T10:05:00.000Z'),
      ...overrides,
    });

  beforeEach(() => {
    crm = fakeCrm();
    leads = new MemoryLeadStore();
    deadLetters = new MemoryDeadLetters();
    tokenState = 'READY';
    killSwitch = false;
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    loadRecording = vi.fn<(path: string) => Promise<RecordingFile>>().mockResolvedValue(recording);
    locateRecording = vi.fn<(uniqueId: string) => Promise<string | null>>().mockResolvedValue(null);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('happy path', () => {
    it('creates a lead for the matched contact and attaches the call note', async () => {
      const result = await createOrchestrator().handle(makeFact());

      expect(result).toEqual({
        outcome: 'synced',
        uniqueId: '1709373600.42',
        leadRef: { kind: 'lead', leadId: 500, contactId: 11, noteId: 900 },
        attempts: 1,
        warnings: [],
      });
      expect(crm.findLeadByCallId).toHaveBeenCalledWith('1709373600.42');
      expect(crm.findContacts).toHaveBeenCalledWith('79991234567');
      expect(crm.createOrUpdateLead).toHaveBeenCalledWith(makeFact(), 11, undefined);
      expect(crm.addCallNote).toHaveBeenCalledTimes(1);
      expect(crm.findCallNote).not.toHaveBeenCalled();
      expect(leads.refs.get('1709373600.42')).toEqual({ kind: 'lead', leadId: 500, contactId: 11, noteId: 900 });
      expect(locateRecording).toHaveBeenCalledWith('1709373600.42');
      expect(crm.attachRecording).not.toHaveBeenCalled();
    });

    it('uses the first contact when several share the number', async () => {
      crm.findContacts.mockResolvedValue([IVAN, { id: 12, name: 'Ivan (old)', phones: ['79991234567'] }]);

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toMatchObject({ outcome: 'synced', leadRef: { contactId: 11 } });
    });
  });

  describe('idempotency', () => {
    it('yields one lead and one note when PBX and webhook report the same call', async () => {
      const orchestrator = createOrchestrator();

      const [fromPbx, fromWebhook] = await Promise.all([
        orchestrator.handle(makeFact()),
        orchestrator.handle(makeFact({ source: 'webhook', durationSeconds: 118 })),
      ]);

      expect(fromPbx).toMatchObject({ outcome: 'synced', leadRef: { leadId: 500 } });
      expect(fromWebhook).toMatchObject({ outcome: 'synced', leadRef: { leadId: 500, noteId: 900 } });
      expect(crm.createOrUpdateLead).toHaveBeenCalledTimes(2);
      expect(crm.createOrUpdateLead.mock.calls[1][2]).toEqual({ kind: 'lead', leadId: 500, contactId: 11, noteId: 900 });
      expect(crm.findContacts).toHaveBeenCalledTimes(1);
      expect(crm.addCallNote).toHaveBeenCalledTimes(1);
    });

    it('does not add a second note when a retry follows a note failure', async () => {
      crm.addCallNote
        .mockRejectedValueOnce(new CrmTransientError('CRM API error: 502', 502))
        .mockResolvedValueOnce(901);

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toMatchObject({ outcome: 'synced', attempts: 2, leadRef: { leadId: 500, noteId: 901 } });
      expect(crm.createOrUpdateLead.mock.calls[0][2]).toBeUndefined();
      expect(crm.createOrUpdateLead.mock.calls[1][2]).toEqual({ kind: 'lead', leadId: 500, contactId: 11 });
      expect(crm.addCallNote).toHaveBeenCalledTimes(2);
      expect(crm.findCallNote).toHaveBeenCalledWith({ kind: 'lead', leadId: 500, contactId: 11 }, '1709373600.42');
    });

    it('reuses a lead the CRM committed before the create timed out', async () => {
      const created: number[] = [];
      crm.createOrUpdateLead.mockImplementation(async (_fact, contactId, existing) => {
        if (existing) return existing;
        created.push(500 + created.length);
        if (created.length === 1) {
          throw new CrmTransientError('CRM request timed out after 10000ms (POST /api/v4/leads)');
        }
        return { kind: 'lead', leadId: created[created.length - 1], contactId };
      });
      crm.findLeadByCallId.mockImplementation(async () =>
        created.length > 0 ? { kind: 'lead', leadId: created[0], contactId: 11 } : null,
      );

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toMatchObject({
        outcome: 'synced',
        attempts: 2,
        leadRef: { kind: 'lead', leadId: 500, contactId: 11, noteId: 900 },
      });
      expect(created).toEqual([500]);
      expect(crm.findContacts).toHaveBeenCalledTimes(1);
      expect(crm.addCallNote).toHaveBeenCalledTimes(1);
    });

    it('reuses a note the CRM committed before the note request timed out', async () => {
      crm.addCallNote.mockRejectedValueOnce(
        new CrmTransientError('CRM request timed out after 10000ms (POST /api/v4/leads/500/notes)'),
      );
      crm.findCallNote.mockResolvedValue(900);

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toMatchObject({ outcome: 'synced', attempts: 2, leadRef: { leadId: 500, noteId: 900 } });
      expect(crm.addCallNote).toHaveBeenCalledTimes(1);
      expect(leads.refs.get('1709373600.42')).toEqual({ kind: 'lead', leadId: 500, contactId: 11, noteId: 900 });
    });
  });

  describe('unknown contact', () => {
    beforeEach(() => {
      crm.findContacts.mockResolvedValue([]);
    });

    it('skips under the skip policy', async () => {
      const result = await createOrchestrator({ unknownContactPolicy: 'skip' }).handle(makeFact());

      expect(result).toEqual({ outcome: 'skipped', uniqueId: '1709373600.42', reason: 'contact_not_found' });
      expect(crm.createOrUpdateLead).not.toHaveBeenCalled();
    });

    it('creates one unsorted entry per call under the unsorted policy', async () => {
      const orchestrator = createOrchestrator({ unknownContactPolicy: 'unsorted' });

      const first = await orchestrator.handle(makeFact());
      const second = await orchestrator.handle(makeFact({ source: 'webhook' }));

      expect(first).toMatchObject({ outcome: 'synced', leadRef: { kind: 'unsorted', uid: 'unsorted-abc' } });
      expect(second).toMatchObject({ outcome: 'synced', leadRef: { kind: 'unsorted', uid: 'unsorted-abc' } });
      expect(crm.createUnsorted).toHaveBeenCalledTimes(1);
      expect(crm.createOrUpdateLead).not.toHaveBeenCalled();
    });

    it('creates the contact first under the create_contact policy', async () => {
      const result = await createOrchestrator({ unknownContactPolicy: 'create_contact' }).handle(makeFact());

      expect(crm.createContact).toHaveBeenCalledWith('79991234567');
      expect(result).toMatchObject({ outcome: 'synced', leadRef: { kind: 'lead', contactId: 77 } });
    });
  });

  describe('failures', () => {
    it('retries transient failures with backoff', async () => {
      crm.findContacts
        .mockRejectedValueOnce(new CrmTransientError('CRM API error: 503', 503))
        .mockRejectedValueOnce(new CrmTransientError('CRM API error: 429', 429))
        .mockResolvedValueOnce([IVAN]);

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toMatchObject({ outcome: 'synced', attempts: 3 });
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('dead-letters after the last transient failure', async () => {
      crm.findContacts.mockRejectedValue(new CrmTransientError('CRM API error: 503', 503));

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toEqual({
        outcome: 'dead_lettered',
        uniqueId: '1709373600.42',
        error: { kind: 'crm_transient', message: 'CRM API error: 503' },
        attempts: 3,
      });
      expect(crm.findContacts).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(deadLetters.entries.get('1709373600.42')).toEqual({
        fact: makeFact(),
        reason: 'transient_exhausted',
        error: { kind: 'crm_transient', message: 'CRM API error: 503' },
        attempts: 3,
        parkedAt: '2026-03-02T10:05:00.000Z',
      });
    });

    it('wraps unexpected errors as transient', async () => {
      crm.findContacts.mockRejectedValue(new Error('socket hang up'));

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toMatchObject({
        outcome: 'dead_lettered',
        error: { kind: 'crm_transient', message: 'Unexpected sync error: socket hang up' },
      });
    });

    it('fails permanent errors without retrying', async () => {
      crm.createOrUpdateLead.mockRejectedValue(new CrmPermanentError('CRM API error: 400', 400));

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toEqual({
        outcome: 'failed',
        uniqueId: '1709373600.42',
        error: { kind: 'crm_permanent', message: 'CRM API error: 400' },
        attempts: 1,
      });
      expect(sleep).not.toHaveBeenCalled();
      expect(deadLetters.entries.size).toBe(0);
    });

    it('fails a call without a usable number before touching the CRM', async () => {
      const result = await createOrchestrator().handle(
        makeFact({ phone: null, rawPhone: '101', phoneError: 'phone number too short (3 digits)' }),
      );

      expect(result).toEqual({
        outcome: 'failed',
        uniqueId: '1709373600.42',
        error: { kind: 'validation', message: 'Call has no usable phone number: phone number too short (3 digits)' },
        attempts: 0,
      });
      expect(crm.findContacts).not.toHaveBeenCalled();
    });
  });

  describe('authorization', () => {
    it('pauses and parks when the CRM authorization expires mid-sync', async () => {
      crm.findContacts.mockRejectedValue(new AuthExpiredError());

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toEqual({ outcome: 'paused', uniqueId: '1709373600.42', reason: 'auth_expired' });
      expect(deadLetters.entries.get('1709373600.42')).toMatchObject({ reason: 'auth_expired', attempts: 1 });
      expect(sleep).not.toHaveBeenCalled();
    });

    it('pauses without contacting the CRM while authorization is required', async () => {
      tokenState = 'NEEDS_AUTH';

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toEqual({ outcome: 'paused', uniqueId: '1709373600.42', reason: 'auth_expired' });
      expect(crm.findContacts).not.toHaveBeenCalled();
      expect(deadLetters.entries.get('1709373600.42')).toMatchObject({
        reason: 'auth_expired',
        attempts: 0,
        error: { kind: 'auth_expired' },
      });
    });
  });

  describe('kill switch', () => {
    it('skips without touching the CRM or the stores', async () => {
      killSwitch = true;

      const result = await createOrchestrator().handle(makeFact());

      expect(result).toEqual({ outcome: 'skipped', uniqueId: '1709373600.42', reason: 'kill_switch' });
      expect(crm.findContacts).not.toHaveBeenCalled();
      expect(deadLetters.entries.size).toBe(0);
    });
  });

  describe('recordings', () => {
    it('uploads the recording named on the fact once', async () => {
      const orchestrator = createOrchestrator();
      const fact = makeFact({ recordingPath: '/var/spool/asterisk/monitor/in-1709373600.42.wav' });

      const result = await orchestrator.handle(fact);
      await orchestrator.handle(fact);

      expect(loadRecording).toHaveBeenCalledWith('/var/spool/asterisk/monitor/in-1709373600.42.wav');
      expect(crm.attachRecording).toHaveBeenCalledTimes(1);
      expect(crm.attachRecording).toHaveBeenCalledWith({ kind: 'lead', leadId: 500, contactId: 11, noteId: 900 }, recording);
      expect(locateRecording).not.toHaveBeenCalled();
      expect(result).toMatchObject({ leadRef: { recordingAttached: true }, warnings: [] });
    });

    it('falls back to the recording locator', async () => {
      locateRecording.mockResolvedValue('/var/spool/asterisk/monitor/2026/03/02/in-1709373600.42.wav');

      await createOrchestrator().handle(makeFact());

      expect(loadRecording).toHaveBeenCalledWith('/var/spool/asterisk/monitor/2026/03/02/in-1709373600.42.wav');
      expect(crm.attachRecording).toHaveBeenCalledTimes(1);
    });

    it('still syncs with a warning when the recording cannot be used', async () => {
      loadRecording.mockRejectedValue(new RecordingUnavailableError('Recording is empty: in-1709373600.42.wav'));

      const result = await createOrchestrator().handle(makeFact({ recordingPath: '/tmp/in-1709373600.42.wav' }));

      expect(result).toMatchObject({
        outcome: 'synced',
        attempts: 1,
        warnings: ['recording_unavailable: Recording is empty: in-1709373600.42.wav'],
      });
      expect(leads.refs.get('1709373600.42')).toEqual({ kind: 'lead', leadId: 500, contactId: 11, noteId: 900 });
    });

    it('downgrades an upload failure to a warning', async () => {
      crm.attachRecording.mockRejectedValue(new CrmPermanentError('CRM API error: 413', 413));

      const result = await createOrchestrator().handle(makeFact({ recordingPath: '/tmp/in-1709373600.42.wav' }));

      expect(result).toMatchObject({ outcome: 'synced', warnings: ['recording_unavailable: CRM API error: 413'] });
    });
  });

  describe('redrive', () => {
    it('re-handles parked calls and removes the ones that went through', async () => {
      crm.findContacts.mockRejectedValue(new CrmTransientError('CRM API error: 503', 503));
      const orchestrator = createOrchestrator();
      await orchestrator.handle(makeFact());
      await orchestrator.handle(makeFact({ uniqueId: '1709373600.50' }));
      expect(deadLetters.entries.size).toBe(2);

      crm.findContacts.mockResolvedValue([IVAN]);
      const results = await orchestrator.redrive({ uniqueId: '1709373600.50' });

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ outcome: 'synced', uniqueId: '1709373600.50' });
      expect([...deadLetters.entries.keys()]).toEqual(['1709373600.42']);
    });

    it('keeps entries that are parked again', async () => {
      crm.findContacts.mockRejectedValue(new CrmTransientError('CRM API error: 503', 503));
      const orchestrator = createOrchestrator();
      await orchestrator.handle(makeFact());

      const results = await orchestrator.redrive();

      expect(results[0]).toMatchObject({ outcome: 'dead_lettered' });
      expect(deadLetters.entries.has('1709373600.42')).toBe(true);
    });

    it('re-drives only auth-expired entries after re-authorization', async () => {
      await deadLetters.park({
        fact: makeFact({ uniqueId: 'auth-1' }),
        reason: 'auth_expired',
        error: { kind: 'auth_expired', message: 'CRM authorization expired.' },
        attempts: 0,
        parkedAt: '2026-03-02T10:01:00.000Z',
      });
      await deadLetters.park({
        fact: makeFact({ uniqueId: 'transient-1' }),
        reason: 'transient_exhausted',
        error: { kind: 'crm_transient', message: 'CRM API error: 503' },
        attempts: 3,
        parkedAt: '2026-03-02T10:02:00.000Z',
      });

      const results = await createOrchestrator().redrive({ reason: 'auth_expired' });

      expect(results.map((r) => [r.uniqueId, r.outcome])).toEqual([['auth-1', 'synced']]);
      expect([...deadLetters.entries.keys()]).toEqual(['transient-1']);
    });
  });
});
