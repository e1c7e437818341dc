/**
 * Call Fact Builders
 *
 * Both entry points (PBX tracker handoff and inbound webhook) are converted
 * here into the single CallFact shape, so the sync pipeline carries no
 * source-specific logic.
 */

import { normalizePhone } from './phone.js';
import { ABANDONED_TRACKING } from './types.js';
import type { CallDirection, CallFact, CallSession } from './types.js';

export function factFromSession(session: CallSession): CallFact {
  const endedAt = session.endTime ?? new Date(session.lastActivity);
  return {
    uniqueId: session.uniqueId,
    source: 'pbx',
    phone: session.callerNumber,
    rawPhone: session.rawNumber,
    ...(session.numberError ? { phoneError: session.numberError } : {}),
    direction: session.direction,
    status: session.status,
    durationSeconds: session.durationSeconds,
    startedAt: session.startTime.toISOString(),
    endedAt: endedAt.toISOString(),
    ...(session.recordingPath ? { recordingPath: session.recordingPath } : {}),
    abandoned: session.status === ABANDONED_TRACKING,
  };
}

export interface WebhookCall {
  uniqueid: string;
  phone: string;
  direction: CallDirection;
  duration: number;
  status: string;
}

/**
 * Build a fact from a validated webhook body. Start time is derived from
 * the reported duration since the caller does not send one.
 */
export function factFromWebhook(call: WebhookCall, receivedAt: Date, defaultCountryCode = '7'): CallFact {
  const normalized = normalizePhone(call.phone, { defaultCountryCode });
  const startedAt = new Date(receivedAt.getTime() - call.duration * 1000);
  return {
    uniqueId: call.uniqueid,
    source: 'webhook',
    phone: normalized.ok ? normalized.number : null,
    rawPhone: call.phone,
    ...(normalized.ok ? {} : { phoneError: normalized.reason }),
    direction: call.direction,
    status: call.status,
    durationSeconds: call.duration,
    startedAt: startedAt.toISOString(),
    endedAt: receivedAt.toISOString(),
    abandoned: false,
  };
}
