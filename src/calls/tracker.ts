/**
 * Call Session Tracker
 *
 * Correlates the live PBX event stream into one CallSession per unique id:
 *
 *   NEW -> RINGING -> ANSWERED -> ENDED
 *
 * - RING moves NEW to RINGING; a repeated or late RING changes nothing
 * - ANSWER and BRIDGE move to ANSWERED once; duplicates change nothing
 * - HANGUP ends the session from any state and returns it for handoff;
 *   the tracker forgets it immediately
 * - Events arriving after HANGUP are dropped (tombstoned ids), logged
 * - Sessions idle past the timeout are force-ended as ABANDONED_TRACKING
 *
 * Must be driven from a single logical thread: the AMI listener's event
 * callback and the sweep timer, both on the Node.js event loop.
 */

import { maskPhone, normalizePhone } from './phone.js';
import { ABANDONED_TRACKING, ANSWERED, NO_ANSWER } from './types.js';
import type { CallEvent, CallSession } from './types.js';

export interface TrackerOptions {
  /** Idle time after which an open session is force-finalized */
  sessionTimeoutMs: number;
  /** How long ended ids are remembered to drop late events (default: sessionTimeoutMs) */
  tombstoneTtlMs?: number;
  sweepIntervalMs?: number;
  defaultCountryCode?: string;
  now?: () => number;
}

export class CallSessionTracker {
  private readonly sessions = new Map<string, CallSession>();
  private readonly ended = new Map<string, number>();
  private readonly sessionTimeoutMs: number;
  private readonly tombstoneTtlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly defaultCountryCode: string;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: TrackerOptions) {
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.tombstoneTtlMs = options.tombstoneTtlMs ?? options.sessionTimeoutMs;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.defaultCountryCode = options.defaultCountryCode ?? '7';
    this.now = options.now ?? Date.now;
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  get(uniqueId: string): CallSession | undefined {
    return this.sessions.get(uniqueId);
  }

  /**
   * Apply one event. Returns the finalized session on HANGUP, null otherwise.
   */
  ingest(event: CallEvent): CallSession | null {
    if (this.ended.has(event.uniqueId)) {
      console.warn('[tracker] Event after hangup dropped', { uniqueId: event.uniqueId, type: event.type });
      return null;
    }

    let session = this.sessions.get(event.uniqueId);
    if (!session) {
      session = this.createSession(event);
      this.sessions.set(event.uniqueId, session);
    }

    session.lastActivity = this.now();
    if (session.direction === 'unknown' && event.direction !== 'unknown') {
      session.direction = event.direction;
    }
    this.fillNumber(session, event);

    switch (event.type) {
      case 'RING':
        if (session.state === 'NEW') {
          session.state = 'RINGING';
        }
        return null;

      case 'ANSWER':
      case 'BRIDGE':
        if (session.state === 'NEW' || session.state === 'RINGING') {
          session.state = 'ANSWERED';
          session.answerTime = event.timestamp;
        }
        return null;

      case 'HANGUP': {
        const status = session.answerTime ? ANSWERED : (event.hangupCause || NO_ANSWER);
        const duration = event.durationSeconds ?? secondsBetween(session.answerTime, event.timestamp);
        const finalized = this.finalize(session, event.timestamp, status, duration);
        console.log('[tracker] Call ended', {
          uniqueId: finalized.uniqueId,
          phone: maskPhone(finalized.callerNumber),
          direction: finalized.direction,
          status: finalized.status,
          duration: finalized.durationSeconds,
        });
        return finalized;
      }
    }
  }

  /**
   * Force-finalize sessions idle for at least the timeout and purge expired
   * tombstones. Each abandoned session is returned exactly once.
   */
  sweep(now = this.now()): CallSession[] {
    const abandoned: CallSession[] = [];

    for (const session of [...this.sessions.values()]) {
      if (now - session.lastActivity >= this.sessionTimeoutMs) {
        const finalized = this.finalize(session, new Date(now), ABANDONED_TRACKING, 0);
        console.warn('[tracker] Session abandoned without hangup', {
          uniqueId: finalized.uniqueId,
          idleMs: now - session.lastActivity,
        });
        abandoned.push(finalized);
      }
    }

    for (const [uniqueId, endedAt] of this.ended) {
      if (now - endedAt >= this.tombstoneTtlMs) {
        this.ended.delete(uniqueId);
      }
    }

    return abandoned;
  }

  /** Run sweep() on an interval, handing abandoned sessions to the callback */
  start(onAbandoned: (session: CallSession) => void): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      for (const session of this.sweep()) {
        onAbandoned(session);
      }
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private createSession(event: CallEvent): CallSession {
    return {
      uniqueId: event.uniqueId,
      state: 'NEW',
      status: NO_ANSWER,
      callerNumber: null,
      rawNumber: '',
      direction: event.direction,
      channel: event.channel,
      startTime: event.timestamp,
      durationSeconds: 0,
      lastActivity: this.now(),
    };
  }

  /** Normalize the external party's number once; later events only fill a gap */
  private fillNumber(session: CallSession, event: CallEvent): void {
    if (session.callerNumber !== null) return;

    const raw = session.direction === 'outbound' ? event.calleeNumber : event.callerNumber;
    if (!raw) return;

    const normalized = normalizePhone(raw, { defaultCountryCode: this.defaultCountryCode });
    if (normalized.ok) {
      session.callerNumber = normalized.number;
      session.rawNumber = raw;
      delete session.numberError;
    } else if (!session.rawNumber) {
      session.rawNumber = raw;
      session.numberError = normalized.reason;
    }
  }

  private finalize(session: CallSession, endTime: Date, status: string, durationSeconds: number): CallSession {
    session.state = 'ENDED';
    session.endTime = endTime;
    session.status = status;
    session.durationSeconds = durationSeconds;

    this.sessions.delete(session.uniqueId);
    this.ended.set(session.uniqueId, this.now());
    return { ...session };
  }
}

function secondsBetween(from: Date | undefined, to: Date): number {
  if (!from) return 0;
  return Math.max(0, Math.round((to.getTime() - from.getTime()) / 1000));
}
