/**
 * Express Webhook Server
 *
 * HTTP layer of the call sync service. Routes:
 * - POST /webhook/call: accept a call reported by a third-party system, enqueue it
 * - GET /health: PBX, token and backlog status
 * - GET /oauth: CRM OAuth callback (authorization code exchange)
 * - GET /admin/dead-letter: list parked calls
 * - POST /admin/redrive: re-handle parked calls (all, or one uniqueid)
 *
 * The webhook endpoint:
 * 1. Checks kill switch (returns 503 if active)
 * 2. Validates the body and normalizes the phone number (400 on failure)
 * 3. Enqueues a call fact on the webhook queue (jobId = call-{uniqueid})
 * 4. Returns 202 Accepted without waiting for the CRM
 *
 * No phone numbers are logged; payloads are sanitized before any console output.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { factFromWebhook } from '../calls/call-fact.js';
import type { CallFact } from '../calls/types.js';
import type { TokenStore } from '../auth/token-store.js';
import type { ListenerStatus } from '../ami/listener.js';
import type { DeadLetterStore } from '../sync/dead-letter.js';
import type { SyncOrchestrator } from '../sync/orchestrator.js';
import { errorMessage } from '../errors.js';
import { sanitizeForLog } from './sanitize.js';
import { createHealthHandler } from './health.js';
import { RedriveRequestSchema, WebhookCallPayloadSchema } from './types.js';

export interface AppDeps {
  killSwitch: () => boolean;
  enqueue: (fact: CallFact) => Promise<void>;
  orchestrator: Pick<SyncOrchestrator, 'redrive'>;
  deadLetters: Pick<DeadLetterStore, 'list' | 'count'>;
  tokens: Pick<TokenStore, 'status' | 'authorizeUrl' | 'exchangeCode'>;
  pbx: { status(): ListenerStatus };
  tracker: { readonly activeCount: number };
  defaultCountryCode: string;
  version?: string;
  now?: () => Date;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not catch rejected handlers; route them to the error handler */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * with their own dependencies.
 */
export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json());

  // Health check
  app.get('/health', asyncRoute(createHealthHandler(deps)));

  // Call webhook endpoint
  app.post('/webhook/call', asyncRoute(async (req, res) => {
    // Kill switch check: 503 so the caller retries later
    if (deps.killSwitch()) {
      console.log('[webhook] Kill switch active, rejecting call webhook');
      res.status(503).json({ message: 'Automation disabled' });
      return;
    }

    const parsed = WebhookCallPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(body)');
      console.warn('[webhook] Invalid call payload', { fields, body: sanitizeForLog(req.body) });
      res.status(400).json({ error: 'Invalid payload', fields });
      return;
    }

    const fact = factFromWebhook(parsed.data, deps.now?.() ?? new Date(), deps.defaultCountryCode);
    if (fact.phone === null) {
      console.warn('[webhook] Phone number rejected', { uniqueId: fact.uniqueId, reason: fact.phoneError });
      res.status(400).json({ error: 'Invalid phone number', reason: fact.phoneError });
      return;
    }

    await deps.enqueue(fact);
    res.status(202).json({ accepted: true, uniqueid: fact.uniqueId });
  }));

  // CRM OAuth callback
  app.get('/oauth', asyncRoute(async (req, res) => {
    const code = typeof req.query.code === 'string' ? req.query.code : '';
    if (!code) {
      res.status(400).json({ error: 'Missing authorization code', authorizeUrl: deps.tokens.authorizeUrl() });
      return;
    }

    try {
      const token = await deps.tokens.exchangeCode(code);
      console.log('[oauth] Authorization code exchanged', { expiresAt: token.expiresAt });
      res.json({ authorized: true, expiresAt: token.expiresAt });
    } catch (err) {
      console.error('[oauth] Code exchange failed', { error: errorMessage(err) });
      res.status(502).json({ error: 'Authorization code exchange failed' });
    }
  }));

  // Admin: list parked calls
  app.get('/admin/dead-letter', asyncRoute(async (_req, res) => {
    const entries = await deps.deadLetters.list();
    res.json({
      count: entries.length,
      entries: entries.map((entry) => ({
        uniqueid: entry.fact.uniqueId,
        source: entry.fact.source,
        reason: entry.reason,
        error: entry.error,
        attempts: entry.attempts,
        parkedAt: entry.parkedAt,
      })),
    });
  }));

  // Admin: re-drive parked calls
  app.post('/admin/redrive', asyncRoute(async (req, res) => {
    const parsed = RedriveRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid payload' });
      return;
    }

    const results = await deps.orchestrator.redrive(
      parsed.data.uniqueid ? { uniqueId: parsed.data.uniqueid } : {},
    );
    console.log('[admin] Re-drive finished', { count: results.length });
    res.json({ count: results.length, results });
  }));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
