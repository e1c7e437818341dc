/**
 * AmoCRM Client
 *
 * Thin, retry-policy-free transport over the AmoCRM v4 REST API:
 * - contact search by normalized phone, minimal contact creation
 * - lead create/update and lookup by call id, call notes, unsorted SIP entries
 * - recording upload (multipart)
 *
 * Auth:
 * - Every request first asks the Token Store for a valid token (refreshed
 *   inside the safety margin, single-flight)
 * - A 401 triggers exactly one refresh-and-retry; a second 401 marks the
 *   store NEEDS_AUTH and throws AuthExpiredError
 *
 * Errors: 429/5xx/network/timeout -> CrmTransientError, other 4xx and
 * unparseable bodies -> CrmPermanentError. Retry decisions belong to the caller.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { normalizePhone } from '../calls/phone.js';
import type { CallFact } from '../calls/types.js';
import { ANSWERED } from '../calls/types.js';
import { AuthExpiredError, CrmPermanentError, CrmTransientError, errorMessage } from '../errors.js';
import type { TokenStore } from '../auth/token-store.js';
import {
  CALL_STATUS,
  ContactSearchResponseSchema,
  CreatedContactsSchema,
  CreatedLeadsSchema,
  CreatedNotesSchema,
  CreatedUnsortedSchema,
  LeadSearchResponseSchema,
  NoteListResponseSchema,
  PHONE_FIELD_CODE,
  UpdatedLeadSchema,
} from './types.js';
import type { ContactSearchResponse, CrmContact, LeadRefLead, LeadRefUnsorted, RecordingFile } from './types.js';

/** The operations the sync orchestrator needs from a CRM */
export interface CrmGateway {
  ensureValidToken(): Promise<void>;
  findContacts(phone: string): Promise<CrmContact[]>;
  createContact(phone: string): Promise<CrmContact>;
  createUnsorted(fact: CallFact): Promise<LeadRefUnsorted>;
  createOrUpdateLead(fact: CallFact, contactId: number, existing?: LeadRefLead): Promise<LeadRefLead>;
  findLeadByCallId(uniqueId: string): Promise<LeadRefLead | null>;
  addCallNote(lead: LeadRefLead, fact: CallFact): Promise<number>;
  findCallNote(lead: LeadRefLead, uniqueId: string): Promise<number | null>;
  attachRecording(lead: LeadRefLead, file: RecordingFile): Promise<void>;
}

export type TokenProvider = Pick<TokenStore, 'getAccessToken' | 'refresh' | 'markNeedsAuth'>;

export interface AmoCrmClientOptions {
  baseUrl: string;
  tokens: TokenProvider;
  timeoutMs: number;
  defaultCountryCode?: string;
}

type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'form'; value: FormData };

export class AmoCrmClient implements CrmGateway {
  private readonly baseUrl: string;
  private readonly tokens: TokenProvider;
  private readonly timeoutMs: number;
  private readonly defaultCountryCode: string;

  constructor(options: AmoCrmClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.tokens = options.tokens;
    this.timeoutMs = options.timeoutMs;
    this.defaultCountryCode = options.defaultCountryCode ?? '7';
  }

  async ensureValidToken(): Promise<void> {
    await this.tokens.getAccessToken();
  }

  /**
   * Contacts matching the number, in the CRM's ranking order.
   * Disambiguation is left to the caller.
   */
  async findContacts(phone: string): Promise<CrmContact[]> {
    const params = new URLSearchParams({ query: phone });
    const data = await this.request('GET', `/api/v4/contacts?${params.toString()}`, ContactSearchResponseSchema);
    if (!data) return [];
    return data._embedded.contacts.map(contact => this.toContact(contact));
  }

  async findContact(phone: string): Promise<CrmContact | null> {
    const contacts = await this.findContacts(phone);
    return contacts[0] ?? null;
  }

  async createContact(phone: string): Promise<CrmContact> {
    const data = await this.requireBody(
      this.request('POST', '/api/v4/contacts', CreatedContactsSchema, {
        kind: 'json',
        value: [{ name: `+${phone}`, custom_fields_values: [phoneField(phone)] }],
      }),
      'create contact',
    );
    return { id: data._embedded.contacts[0].id, name: `+${phone}`, phones: [phone] };
  }

  /** Unsorted SIP entry keyed by the call's unique id (source_uid) */
  async createUnsorted(fact: CallFact): Promise<LeadRefUnsorted> {
    const phone = fact.phone ?? fact.rawPhone;
    const calledAt = Math.floor(Date.parse(fact.startedAt) / 1000);
    const data = await this.requireBody(
      this.request('POST', '/api/v4/leads/unsorted/sip', CreatedUnsortedSchema, {
        kind: 'json',
        value: [{
          source_name: 'PBX',
          source_uid: fact.uniqueId,
          created_at: calledAt,
          metadata: {
            is_call_event_needed: true,
            uniq: fact.uniqueId,
            duration: fact.durationSeconds,
            service_code: 'pbx_call_sync',
            phone,
            called_at: calledAt,
            from: phone,
          },
          _embedded: {
            leads: [{ name: leadName(fact) }],
            contacts: [{ name: `+${phone}`, custom_fields_values: [phoneField(phone)] }],
          },
        }],
      }),
      'create unsorted',
    );
    return { kind: 'unsorted', uid: data._embedded.unsorted[0].uid };
  }

  async createOrUpdateLead(fact: CallFact, contactId: number, existing?: LeadRefLead): Promise<LeadRefLead> {
    if (existing) {
      await this.requireBody(
        this.request('PATCH', `/api/v4/leads/${existing.leadId}`, UpdatedLeadSchema, {
          kind: 'json',
          value: { name: leadName(fact) },
        }),
        'update lead',
      );
      return existing;
    }

    const data = await this.requireBody(
      this.request('POST', '/api/v4/leads', CreatedLeadsSchema, {
        kind: 'json',
        value: [{ name: leadName(fact), _embedded: { contacts: [{ id: contactId }] } }],
      }),
      'create lead',
    );
    return { kind: 'lead', leadId: data._embedded.leads[0].id, contactId };
  }

  /**
   * The lead an earlier attempt created for this call, found by the call
   * marker in its name. Only leads with a linked contact count.
   */
  async findLeadByCallId(uniqueId: string): Promise<LeadRefLead | null> {
    const params = new URLSearchParams({ query: uniqueId, with: 'contacts' });
    const data = await this.request('GET', `/api/v4/leads?${params.toString()}`, LeadSearchResponseSchema);
    if (!data) return null;

    const marker = callMarker(uniqueId);
    for (const lead of data._embedded.leads) {
      const contactId = lead._embedded?.contacts?.[0]?.id;
      if (lead.name?.endsWith(marker) && contactId !== undefined) {
        return { kind: 'lead', leadId: lead.id, contactId };
      }
    }
    return null;
  }

  /** Id of a call note on the lead carrying this call's unique id, if any */
  async findCallNote(lead: LeadRefLead, uniqueId: string): Promise<number | null> {
    const params = new URLSearchParams([
      ['filter[note_type][]', 'call_in'],
      ['filter[note_type][]', 'call_out'],
      ['limit', '250'],
    ]);
    const data = await this.request(
      'GET',
      `/api/v4/leads/${lead.leadId}/notes?${params.toString()}`,
      NoteListResponseSchema,
    );
    const note = data?._embedded.notes.find((n) => n.params?.uniq !== undefined && String(n.params.uniq) === uniqueId);
    return note?.id ?? null;
  }

  async addCallNote(lead: LeadRefLead, fact: CallFact): Promise<number> {
    const answered = fact.status === ANSWERED;
    const data = await this.requireBody(
      this.request('POST', `/api/v4/leads/${lead.leadId}/notes`, CreatedNotesSchema, {
        kind: 'json',
        value: [{
          note_type: fact.direction === 'outbound' ? 'call_out' : 'call_in',
          params: {
            uniq: fact.uniqueId,
            duration: fact.durationSeconds,
            source: 'PBX',
            phone: fact.phone ?? fact.rawPhone,
            call_status: answered ? CALL_STATUS.SUCCESS : CALL_STATUS.NOT_ANSWERED,
            call_result: answered ? 'Answered' : fact.status,
          },
        }],
      }),
      'add call note',
    );
    return data._embedded.notes[0].id;
  }

  async attachRecording(lead: LeadRefLead, file: RecordingFile): Promise<void> {
    const form = new FormData();
    form.append('file', new Blob([file.data], { type: file.contentType }), file.name);
    await this.request('POST', `/api/v4/leads/${lead.leadId}/files`, null, { kind: 'form', value: form });
  }

  // ==========================================================================
  // Internal: HTTP helper with token handling and error classification
  // ==========================================================================

  private async request<T>(
    method: string,
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown> | null,
    body?: RequestBody,
  ): Promise<T | null> {
    const token = await this.tokens.getAccessToken();
    let response = await this.send(method, path, token, body);

    if (response.status === 401) {
      await response.text();
      console.warn('[crm] 401 from CRM, refreshing token and retrying once', { method, path: stripQuery(path) });
      const fresh = await this.tokens.refresh(token);
      response = await this.send(method, path, fresh.accessToken, body);

      if (response.status === 401) {
        await response.text();
        this.tokens.markNeedsAuth('access token rejected right after refresh');
        throw new AuthExpiredError();
      }
    }

    if (!response.ok) {
      const responseBody = await response.text();
      const message = `CRM API error: ${response.status} ${response.statusText} (${method} ${stripQuery(path)})`;
      if (response.status === 429 || response.status >= 500) {
        throw new CrmTransientError(message, response.status, responseBody);
      }
      throw new CrmPermanentError(message, response.status, responseBody);
    }

    if (response.status === 204 || !schema) {
      await response.text();
      return null;
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new CrmPermanentError(`CRM response is not JSON: ${errorMessage(err)}`, response.status);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new CrmPermanentError(`CRM response has an unexpected shape (${method} ${stripQuery(path)})`, response.status);
    }
    return parsed.data;
  }

  private async send(method: string, path: string, accessToken: string, body?: RequestBody): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      Accept: 'application/json',
    };
    if (body?.kind === 'json') {
      headers['Content-Type'] = 'application/json';
    }

    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body ? (body.kind === 'json' ? JSON.stringify(body.value) : body.value) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new CrmTransientError(`CRM request timed out after ${this.timeoutMs}ms (${method} ${stripQuery(path)})`);
      }
      throw new CrmTransientError(`CRM request failed: ${errorMessage(err)}`);
    }
  }

  private async requireBody<T>(pending: Promise<T | null>, operation: string): Promise<T> {
    const data = await pending;
    if (data === null) {
      throw new CrmPermanentError(`CRM returned no content for ${operation}`, 204);
    }
    return data;
  }

  private toContact(contact: ContactSearchResponse['_embedded']['contacts'][number]): CrmContact {
    const phones: string[] = [];
    for (const field of contact.custom_fields_values ?? []) {
      if (field.field_code !== PHONE_FIELD_CODE) continue;
      for (const { value } of field.values) {
        const normalized = normalizePhone(String(value), { defaultCountryCode: this.defaultCountryCode });
        if (normalized.ok) phones.push(normalized.number);
      }
    }
    return { id: contact.id, name: contact.name ?? '', phones };
  }
}

function phoneField(phone: string) {
  return { field_code: PHONE_FIELD_CODE, values: [{ value: `+${phone}`, enum_code: 'WORK' }] };
}

/** Suffix that ties a lead to its call, so a retried create can find it */
export function callMarker(uniqueId: string): string {
  return `[call ${uniqueId}]`;
}

function leadName(fact: CallFact): string {
  const label = fact.direction === 'outbound' ? 'Outgoing call to' : 'Incoming call from';
  return `${label} +${fact.phone ?? fact.rawPhone} ${callMarker(fact.uniqueId)}`;
}

/** Query strings carry phone numbers; keep them out of logs and error messages */
function stripQuery(path: string): string {
  const q = path.indexOf('?');
  return q === -1 ? path : path.slice(0, q);
}
