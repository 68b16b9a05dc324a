import { Job, Worker } from 'bullmq';

import { connectionFromRedisUrl, Logger, QueueJobPayload, SESSION_QUEUE_NAME } from '@fixgate/common';

import { TriageOrchestrator } from './orchestrator.js';

export interface WorkerRuntime {
  worker: Worker<QueueJobPayload>;
}

export function startSessionWorker(params: {
  redisUrl: string;
  concurrency: number;
  orchestrator: TriageOrchestrator;
  logger: Logger;
}): WorkerRuntime {
  const worker = new Worker<QueueJobPayload>(
    SESSION_QUEUE_NAME,
    async (job: Job<QueueJobPayload>) => {
      await params.orchestrator.handleJob(job.data);
    },
    {
      connection: connectionFromRedisUrl(params.redisUrl),
      concurrency: params.concurrency
    }
  );

  worker.on('failed', (job, error) => {
    params.logger.error({ jobId: job?.id, name: job?.name, error: error.message }, 'worker job failed');
  });

  worker.on('completed', (job) => {
    params.logger.info({ jobId: job.id, name: job.name }, 'worker job completed');
  });

  return {
    worker
  };
}
