/**
 * Application Entry Point
 *
 * Runs the whole call sync service in a single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Load the CRM token pair (a missing or corrupt file leaves the store in
 *    NEEDS_AUTH; the service keeps running and logs the authorize URL)
 * 3. Start the sync workers (PBX and webhook queues)
 * 4. Start the session tracker sweep and the AMI listener
 * 5. Start the Express server
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop the AMI listener and the tracker sweep
 * 2. Stop accepting new HTTP connections
 * 3. Close the workers (finish current jobs, stop accepting new)
 * 4. Close queue and Redis connections
 * 5. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { appConfig } from './config.js';
import { AmiListener } from './ami/listener.js';
import { AmoOAuthClient } from './auth/oauth-client.js';
import { TokenStore } from './auth/token-store.js';
import { factFromSession } from './calls/call-fact.js';
import { CallSessionTracker } from './calls/tracker.js';
import type { CallSession } from './calls/types.js';
import { AmoCrmClient } from './crm/client.js';
import { errorMessage } from './errors.js';
import { findRecording, loadRecording } from './recordings/finder.js';
import { RedisDeadLetterStore } from './sync/dead-letter.js';
import { RedisLeadKeyStore } from './sync/lead-store.js';
import { SyncOrchestrator } from './sync/orchestrator.js';
import { closeQueues, enqueueCallFact, getRedis } from './sync/queue.js';
import { RetryPolicy } from './sync/retry-policy.js';
import { closeSyncWorkers, createSyncWorkers } from './sync/worker.js';
import { createApp } from './webhook/server.js';

async function main() {
  console.log('[startup] PBX to CRM call sync starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  console.log('[startup] Unknown contact policy:', appConfig.sync.unknownContactPolicy);

  // CRM auth
  const oauth = new AmoOAuthClient({
    baseUrl: appConfig.amocrm.baseUrl,
    clientId: appConfig.amocrm.clientId,
    clientSecret: appConfig.amocrm.clientSecret,
    redirectUri: appConfig.amocrm.redirectUri,
    timeoutMs: appConfig.amocrm.requestTimeoutMs,
  });
  const tokens = new TokenStore({
    filePath: appConfig.amocrm.tokenFile,
    oauth,
    refreshMarginMs: appConfig.amocrm.refreshMarginMs,
  });
  if ((await tokens.load()) === 'NEEDS_AUTH') {
    console.warn('[startup] CRM authorization required. Open:', tokens.authorizeUrl());
  }

  // Sync pipeline
  const crm = new AmoCrmClient({
    baseUrl: appConfig.amocrm.baseUrl,
    tokens,
    timeoutMs: appConfig.amocrm.requestTimeoutMs,
    defaultCountryCode: appConfig.tracker.defaultCountryCode,
  });
  const deadLetters = new RedisDeadLetterStore(getRedis());
  const orchestrator = new SyncOrchestrator({
    crm,
    leads: new RedisLeadKeyStore(getRedis(), { ttlSeconds: appConfig.sync.leadKeyTtlSeconds }),
    deadLetters,
    retry: new RetryPolicy({
      maxAttempts: appConfig.sync.maxAttempts,
      baseDelayMs: appConfig.sync.baseDelayMs,
      maxDelayMs: appConfig.sync.maxDelayMs,
    }),
    tokens,
    unknownContactPolicy: appConfig.sync.unknownContactPolicy,
    killSwitch: () => appConfig.killSwitch,
    locateRecording: (uniqueId) => findRecording(appConfig.sync.recordingsDir, uniqueId),
    loadRecording,
  });

  tokens.onReauthorized(() => {
    orchestrator.redrive({ reason: 'auth_expired' }).catch((err) => {
      console.error('[startup] Re-drive after re-authorization failed', { error: errorMessage(err) });
    });
  });

  createSyncWorkers(orchestrator, {
    pbxConcurrency: appConfig.sync.pbxConcurrency,
    webhookConcurrency: appConfig.sync.webhookConcurrency,
  });

  // PBX side
  const handoff = (session: CallSession) => {
    enqueueCallFact(factFromSession(session)).catch((err) => {
      console.error('[startup] Failed to enqueue finished call', { uniqueId: session.uniqueId, error: errorMessage(err) });
    });
  };

  const tracker = new CallSessionTracker({
    sessionTimeoutMs: appConfig.tracker.sessionTimeoutMs,
    sweepIntervalMs: appConfig.tracker.sweepIntervalMs,
    defaultCountryCode: appConfig.tracker.defaultCountryCode,
  });
  tracker.start(handoff);

  const listener = new AmiListener(appConfig.ami, (event) => {
    const finished = tracker.ingest(event);
    if (finished) handoff(finished);
  });
  listener.start();

  // Start Express server
  const app = createApp({
    killSwitch: () => appConfig.killSwitch,
    enqueue: enqueueCallFact,
    orchestrator,
    deadLetters,
    tokens,
    pbx: listener,
    tracker,
    defaultCountryCode: appConfig.tracker.defaultCountryCode,
  });
  const server = app.listen(appConfig.server.port, appConfig.server.host, () => {
    console.log(`[startup] Server listening on ${appConfig.server.host}:${appConfig.server.port}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    listener.stop();
    tracker.stop();
    console.log('[shutdown] PBX listener stopped');

    // Stop accepting new connections
    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeSyncWorkers();
    console.log('[shutdown] Sync workers closed');

    await closeQueues();
    console.log('[shutdown] All queues closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[shutdown] Error during shutdown:', errorMessage(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exit(1);
});
