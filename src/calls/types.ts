/**
 * Call Domain Types
 *
 * Defines the contract between the PBX listener, the session tracker, the
 * webhook receiver and the sync orchestrator.
 */

import { z } from 'zod';

export type CallEventType = 'RING' | 'ANSWER' | 'HANGUP' | 'BRIDGE';

export type CallDirection = 'inbound' | 'outbound' | 'internal' | 'unknown';

export const CALL_DIRECTIONS = ['inbound', 'outbound', 'internal', 'unknown'] as const satisfies readonly CallDirection[];

/** One raw call lifecycle event as received from the PBX (immutable) */
export interface CallEvent {
  readonly timestamp: Date;
  readonly type: CallEventType;
  readonly uniqueId: string;
  readonly channel: string;
  readonly callerNumber: string;
  readonly calleeNumber: string;
  readonly direction: CallDirection;
  /** Billed duration, when the source reports one with the hangup */
  readonly durationSeconds?: number;
  readonly hangupCause?: string;
}

export type SessionState = 'NEW' | 'RINGING' | 'ANSWERED' | 'ENDED';

export const ABANDONED_TRACKING = 'ABANDONED_TRACKING';
export const ANSWERED = 'ANSWERED';
export const NO_ANSWER = 'NO_ANSWER';

/**
 * A logical call correlated from the event stream by unique id.
 *
 * `callerNumber` is the normalized number of the external party: the caller
 * for inbound calls, the callee for outbound ones. It is null while no event
 * has carried a parseable number; `numberError` then says why.
 */
export interface CallSession {
  uniqueId: string;
  state: SessionState;
  status: string;
  callerNumber: string | null;
  rawNumber: string;
  numberError?: string;
  direction: CallDirection;
  channel: string;
  startTime: Date;
  answerTime?: Date;
  endTime?: Date;
  durationSeconds: number;
  recordingPath?: string;
  lastActivity: number;
}

export type CallFactSource = 'pbx' | 'webhook';

/**
 * Normalized "incoming call fact": the one shape the sync pipeline consumes,
 * whether the call came from the PBX tracker or from the inbound webhook.
 * Timestamps are ISO strings so the fact survives the queue unchanged.
 */
export const CallFactSchema = z.object({
  uniqueId: z.string().min(1),
  source: z.enum(['pbx', 'webhook']),
  phone: z.string().nullable(),
  rawPhone: z.string(),
  phoneError: z.string().optional(),
  direction: z.enum(CALL_DIRECTIONS),
  status: z.string(),
  durationSeconds: z.number().int().nonnegative(),
  startedAt: z.string(),
  endedAt: z.string(),
  recordingPath: z.string().optional(),
  abandoned: z.boolean(),
});

export type CallFact = z.infer<typeof CallFactSchema>;
