// src/services/taskQueue.ts: background job queue port and its BullMQ adapter.
// Delivery guarantees (at-least-once, worker retries) belong to the queue and its workers.
import { Queue, type ConnectionOptions } from 'bullmq';
import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';

export interface TaskQueue {
  /** Resolves to the job id, or rejects when the job could not be queued. */
  enqueue(queueName: string, jobName: string, payload: object): Promise<string>;
  close(): Promise<void>;
}

export function connectionFromUrl(redisUrl: string): ConnectionOptions {
  const url = new URL(redisUrl);
  const db = Number.parseInt(url.pathname.replace(/^\//, ''), 10);
  return {
    host: url.hostname || 'localhost',
    port: url.port ? Number.parseInt(url.port, 10) : 6379,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db: Number.isFinite(db) ? db : 0,
    tls: url.protocol === 'rediss:' ? {} : undefined,
  };
}

export class BullTaskQueue implements TaskQueue {
  private queues = new Map<string, Queue>();

  constructor(
    private readonly connection: ConnectionOptions,
    private readonly log: AppLogger = componentLogger('task-queue'),
  ) {}

  private queueFor(queueName: string): Queue {
    let queue = this.queues.get(queueName);
    if (!queue) {
      queue = new Queue(queueName, {
        connection: this.connection,
        defaultJobOptions: { removeOnComplete: 1000, removeOnFail: 5000 },
      });
      queue.on('error', (err: Error) => {
        this.log.warn('queue:error', { queueName, error: err.message });
      });
      this.queues.set(queueName, queue);
    }
    return queue;
  }

  async enqueue(queueName: string, jobName: string, payload: object): Promise<string> {
    const job = await this.queueFor(queueName).add(jobName, payload);
    if (!job.id) {
      throw new Error(`Queue ${queueName} returned no job id for ${jobName}`);
    }
    return job.id;
  }

  async close(): Promise<void> {
    const closing = [...this.queues.entries()].map(async ([name, queue]) => {
      try {
        await queue.close();
      } catch (err) {
        this.log.warn('queue:close_failed', { queueName: name, error: errorMessage(err) });
      }
    });
    await Promise.all(closing);
    this.queues.clear();
  }
}
