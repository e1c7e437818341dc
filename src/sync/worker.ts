/**
 * BullMQ Workers: one per sync queue
 *
 * Each worker hands the queued call fact to the orchestrator, which owns
 * retries and dead-lettering. A job therefore completes with a SyncResult
 * for every outcome the orchestrator can decide; it only fails when the
 * job data is unreadable or a store is unreachable.
 *
 * Design:
 * - processJob is exported for testing (no BullMQ infrastructure needed)
 * - Workers use the same lazy singleton pattern as queue.ts
 * - PBX and webhook queues get separate concurrency settings
 * - Only metadata is logged, never the phone number
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { CallFactSchema } from '../calls/types.js';
import { ValidationError } from '../errors.js';
import { createRedisConnection, PBX_QUEUE_NAME, WEBHOOK_QUEUE_NAME } from './queue.js';
import type { SyncOrchestrator, SyncResult } from './orchestrator.js';

export interface SyncWorkerOptions {
  pbxConcurrency: number;
  webhookConcurrency: number;
}

const _workers: Worker[] = [];

/**
 * Process a single sync job.
 *
 * @throws ValidationError if the job data is not a call fact
 */
export async function processJob(
  job: Pick<Job<unknown>, 'id' | 'data'>,
  orchestrator: Pick<SyncOrchestrator, 'handle'>,
): Promise<SyncResult> {
  const parsed = CallFactSchema.safeParse(job.data);
  if (!parsed.success) {
    throw new ValidationError(`Job ${job.id} does not carry a call fact`);
  }

  const fact = parsed.data;
  console.log(`[worker] Processing job ${job.id}`, { uniqueId: fact.uniqueId, source: fact.source });

  const result = await orchestrator.handle(fact);
  console.log(`[worker] Job ${job.id} finished`, { uniqueId: fact.uniqueId, outcome: result.outcome });
  return result;
}

function createWorker(queueName: string, concurrency: number, orchestrator: Pick<SyncOrchestrator, 'handle'>): Worker {
  const worker = new Worker(queueName, (job: Job<unknown>) => processJob(job, orchestrator), {
    connection: createRedisConnection(),
    concurrency,
  });

  worker.on('failed', (job, err) => {
    console.error(`[worker] Job ${job?.id} failed`, {
      queue: queueName,
      error: err.message,
    });
  });

  worker.on('error', (err) => {
    console.error('[worker] Worker error', { queue: queueName, error: err.message });
  });

  return worker;
}

/**
 * Start both sync workers (once).
 *
 * @returns The PBX and webhook workers, in that order
 */
export function createSyncWorkers(orchestrator: Pick<SyncOrchestrator, 'handle'>, options: SyncWorkerOptions): Worker[] {
  if (_workers.length > 0) return _workers;

  _workers.push(
    createWorker(PBX_QUEUE_NAME, options.pbxConcurrency, orchestrator),
    createWorker(WEBHOOK_QUEUE_NAME, options.webhookConcurrency, orchestrator),
  );
  console.log('[worker] Sync workers started', options);
  return _workers;
}

/**
 * Close the workers for graceful shutdown, letting in-flight jobs finish.
 */
export async function closeSyncWorkers(): Promise<void> {
  for (const worker of _workers.splice(0)) {
    await worker.close();
  }
}
