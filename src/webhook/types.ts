/**
 * Webhook Type Definitions
 *
 * Defines the contract between third-party callers of POST /webhook/call
 * and the call fact builder.
 */

import { z } from 'zod';
import { CALL_DIRECTIONS } from '../calls/types.js';

/** Callers send ids and numbers either as strings or as JSON numbers */
const idLike = z
  .union([z.string(), z.number()])
  .transform(String)
  .pipe(z.string().trim().min(1));

export const WebhookCallPayloadSchema = z.object({
  uniqueid: idLike,
  phone: idLike,
  direction: z.enum(CALL_DIRECTIONS).default('inbound'),
  duration: z.coerce.number().finite().nonnegative().transform(Math.round).default(0),
  status: z.string().trim().min(1).default('ANSWERED'),
});

export type WebhookCallPayload = z.infer<typeof WebhookCallPayloadSchema>;

export const RedriveRequestSchema = z.object({
  uniqueid: z.union([z.string(), z.number()]).transform(String).optional(),
});
