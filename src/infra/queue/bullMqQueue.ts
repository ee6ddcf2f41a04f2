import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  PrecomputeJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { queueNames } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 2;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  const dbValue = parsed.pathname.replace("/", "").trim();
  const parsedDb = Number.parseInt(dbValue, 10);

  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number.isFinite(parsedDb) ? parsedDb : 0,
    // Required by BullMQ workers; blocking commands must not be retried per request
    maxRetriesPerRequest: null,
  };
};

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  backoff: {
    type: "exponential",
    delay: 5_000,
  },
} as const;

/**
 * BullMQ-backed precompute queue.
 */
export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<PrecomputeJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<PrecomputeJobPayload>(queueNames.precompute, {
      connection,
      defaultJobOptions,
    });
  }

  /**
   * The idempotency key is the job id, so a duplicate enqueue within the same bucket is a no-op.
   */
  async enqueuePrecompute(payload: PrecomputeJobPayload): Promise<void> {
    await this.queue.add(payload.idempotencyKey, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createPrecomputeWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: PrecomputeJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<PrecomputeJobPayload>(
    queueNames.precompute,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
