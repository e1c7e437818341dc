/**
 * Health Check Endpoint Handler
 *
 * Reports PBX connectivity, CRM token state, dead-letter backlog and the
 * number of calls in flight. Always answers 200; `status` is 'ok' only when
 * the PBX session is up and the token is usable, 'degraded' otherwise.
 */

import type { Request, Response } from 'express';
import { errorMessage } from '../errors.js';
import type { AppDeps } from './server.js';

export interface HealthReport {
  status: 'ok' | 'degraded';
  timestamp: string;
  version: string;
  killSwitch: boolean;
  pbx: { state: string; connectedSince: string | null };
  token: { state: string; expiresAt: string | null };
  deadLetters: number | null;
  activeSessions: number;
}

export function createHealthHandler(deps: AppDeps) {
  return async (_req: Request, res: Response): Promise<void> => {
    const pbx = deps.pbx.status();
    const token = deps.tokens.status();

    let deadLetters: number | null = null;
    try {
      deadLetters = await deps.deadLetters.count();
    } catch (err) {
      console.warn('[health] Dead-letter count unavailable', { error: errorMessage(err) });
    }

    const report: HealthReport = {
      status: pbx.state === 'connected' && token.state === 'READY' ? 'ok' : 'degraded',
      timestamp: (deps.now?.() ?? new Date()).toISOString(),
      version: deps.version ?? process.env.npm_package_version ?? 'dev',
      killSwitch: deps.killSwitch(),
      pbx: { state: pbx.state, connectedSince: pbx.connectedSince },
      token: { state: token.state, expiresAt: token.expiresAt },
      deadLetters,
      activeSessions: deps.tracker.activeCount,
    };
    res.json(report);
  };
}
