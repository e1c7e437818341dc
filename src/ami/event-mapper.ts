/**
 * AMI Event Mapping
 *
 * Turns raw manager frames into CallEvents keyed by the call-level id.
 *
 * Asterisk gives every channel leg its own Uniqueid and stamps all legs of
 * one call with the Linkedid of the first leg. Sessions are keyed by
 * Linkedid (falling back to Uniqueid):
 * - the primary leg (Uniqueid === Linkedid) drives RING and HANGUP
 * - secondary legs only report ANSWER (channel went Up) and BRIDGE
 *
 * Channel names are treated as opaque; direction comes from the dialplan
 * context of the primary leg.
 */

import type { CallDirection, CallEvent } from '../calls/types.js';
import type { AmiFrame } from './frame-parser.js';

const INBOUND_CONTEXTS = ['from-trunk', 'from-pstn'];
const OUTBOUND_CONTEXTS = ['from-internal'];
const INTERNAL_CONTEXTS = ['ext-local'];

export function directionFromContext(context: string | undefined): CallDirection {
  const ctx = (context ?? '').toLowerCase();
  if (INBOUND_CONTEXTS.some(c => ctx.includes(c))) return 'inbound';
  if (OUTBOUND_CONTEXTS.some(c => ctx.includes(c))) return 'outbound';
  if (INTERNAL_CONTEXTS.some(c => ctx.includes(c))) return 'internal';
  return 'unknown';
}

/** AMI reports missing caller ids as '<unknown>' */
function cleanNumber(value: string | undefined): string {
  if (!value || value === '<unknown>') return '';
  return value;
}

function eventTime(frame: AmiFrame, now: () => Date): Date {
  const seconds = frame.Timestamp ? parseFloat(frame.Timestamp) : NaN;
  return Number.isFinite(seconds) ? new Date(seconds * 1000) : now();
}

export function mapAmiEvent(frame: AmiFrame, now: () => Date = () => new Date()): CallEvent | null {
  const name = frame.Event;
  const legId = frame.Uniqueid;
  if (!name || !legId) return null;

  const callId = frame.Linkedid || legId;
  const primary = callId === legId;

  const base = {
    timestamp: eventTime(frame, now),
    uniqueId: callId,
    channel: frame.Channel ?? '',
    callerNumber: cleanNumber(frame.CallerIDNum),
    calleeNumber: cleanNumber(frame.ConnectedLineNum) || cleanNumber(frame.Exten),
    direction: primary ? directionFromContext(frame.Context) : 'unknown' as const,
  };

  switch (name) {
    case 'Newchannel':
      return primary ? { ...base, type: 'RING' } : null;

    case 'Newstate':
      return !primary && frame.ChannelStateDesc === 'Up' ? { ...base, type: 'ANSWER' } : null;

    case 'BridgeEnter':
      return { ...base, type: 'BRIDGE' };

    case 'Hangup': {
      if (!primary) return null;
      const cause = frame['Cause-txt'];
      return { ...base, type: 'HANGUP', ...(cause ? { hangupCause: cause } : {}) };
    }

    default:
      return null;
  }
}
