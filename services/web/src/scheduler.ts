import { Queue } from 'bullmq';

import { connectionFromRedisUrl, queueJobId, queueJobName, QueueJobPayload, SESSION_QUEUE_NAME } from '@fixgate/common';

export interface SessionScheduler {
  enqueue(payload: QueueJobPayload): Promise<void>;
}

export class BullSessionScheduler implements SessionScheduler {
  private readonly queue: Queue<QueueJobPayload>;

  constructor(redisUrl: string) {
    this.queue = new Queue<QueueJobPayload>(SESSION_QUEUE_NAME, {
      connection: connectionFromRedisUrl(redisUrl)
    });
  }

  async enqueue(payload: QueueJobPayload): Promise<void> {
    // Job ids repeat per session stage, so finished jobs are removed to let a stage run again.
    await this.queue.add(queueJobName(payload), payload, {
      jobId: queueJobId(payload),
      removeOnComplete: true,
      removeOnFail: true
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
