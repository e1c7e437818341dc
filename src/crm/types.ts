// ============================================================================
// CRM Types: AmoCRM v4 response shapes and the domain view of them
// ============================================================================

import { z } from 'zod';

// ============================================================================
// Domain
// ============================================================================

export interface CrmContact {
  id: number;
  name: string;
  /** Normalized phone numbers found on the contact */
  phones: string[];
}

export interface LeadRefLead {
  kind: 'lead';
  leadId: number;
  contactId: number;
  /** Set once the call note is attached, so retries do not add a second note */
  noteId?: number;
  /** Set once the call recording is uploaded */
  recordingAttached?: boolean;
}

export interface LeadRefUnsorted {
  kind: 'unsorted';
  uid: string;
}

export type LeadRef = LeadRefLead | LeadRefUnsorted;

export const LeadRefSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('lead'),
    leadId: z.number().int(),
    contactId: z.number().int(),
    noteId: z.number().int().optional(),
    recordingAttached: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal('unsorted'),
    uid: z.string(),
  }),
]);

export interface RecordingFile {
  name: string;
  contentType: string;
  data: Buffer;
}

// ============================================================================
// AmoCRM API payloads
// ============================================================================

/** Custom field code AmoCRM uses for the built-in phone field */
export const PHONE_FIELD_CODE = 'PHONE';

/** AmoCRM call_status values for call notes */
export const CALL_STATUS = {
  SUCCESS: 4,
  NOT_ANSWERED: 6,
} as const;

const CustomFieldValuesSchema = z
  .array(
    z.object({
      field_code: z.string().nullable().optional(),
      values: z.array(z.object({ value: z.union([z.string(), z.number()]) })),
    }),
  )
  .nullable()
  .optional();

export const ContactSearchResponseSchema = z.object({
  _embedded: z.object({
    contacts: z.array(
      z.object({
        id: z.number().int(),
        name: z.string().nullable().optional(),
        custom_fields_values: CustomFieldValuesSchema,
      }),
    ),
  }),
});

export type ContactSearchResponse = z.infer<typeof ContactSearchResponseSchema>;

export const CreatedContactsSchema = z.object({
  _embedded: z.object({
    contacts: z.array(z.object({ id: z.number().int() })).min(1),
  }),
});

export const CreatedLeadsSchema = z.object({
  _embedded: z.object({
    leads: z.array(z.object({ id: z.number().int() })).min(1),
  }),
});

export const LeadSearchResponseSchema = z.object({
  _embedded: z.object({
    leads: z.array(
      z.object({
        id: z.number().int(),
        name: z.string().nullable().optional(),
        _embedded: z
          .object({ contacts: z.array(z.object({ id: z.number().int() })).optional() })
          .optional(),
      }),
    ),
  }),
});

export const NoteListResponseSchema = z.object({
  _embedded: z.object({
    notes: z.array(
      z.object({
        id: z.number().int(),
        params: z
          .object({ uniq: z.union([z.string(), z.number()]).optional() })
          .nullable()
          .optional(),
      }),
    ),
  }),
});

export const UpdatedLeadSchema = z.object({
  id: z.number().int(),
});

export const CreatedNotesSchema = z.object({
  _embedded: z.object({
    notes: z.array(z.object({ id: z.number().int() })).min(1),
  }),
});

export const CreatedUnsortedSchema = z.object({
  _embedded: z.object({
    unsorted: z.array(z.object({ uid: z.string() })).min(1),
  }),
});
