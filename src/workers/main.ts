import { createRuntime } from "../application/bootstrap/runtimeFactory";
import {
  createPrecomputeWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { toErrorDetails } from "../shared/logger/errorDetails";
import { logger } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const { config } = runtime;
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      seriesProvider: config.seriesProvider,
      providers: config.providers.map((provider) => provider.name),
      candidateCount: config.modelCall.candidates.length,
      concurrency: config.queueConcurrency,
      redisUrl: config.redisUrl,
      postgresUrl: config.postgresUrl,
    },
    "Worker runtime configuration",
  );

  const worker = createPrecomputeWorker(
    redisConfigFromUrl(config.redisUrl),
    config.queueConcurrency,
    (payload) => runtime.precompute.run(payload),
  );

  const durationOf = (jobId: string | undefined): number | undefined => {
    if (!jobId) {
      return undefined;
    }
    const startedAt = startedAtByJobId.get(jobId);
    startedAtByJobId.delete(jobId);
    return startedAt === undefined ? undefined : Date.now() - startedAt;
  };

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      {
        jobId: job.id,
        tool: job.data.toolName,
        sources: job.data.sources,
        language: job.data.language,
        attempt: job.attemptsMade + 1,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    logger.error(
      {
        jobId: job?.id,
        tool: job?.data.toolName,
        sources: job?.data.sources,
        idempotencyKey: job?.data.idempotencyKey,
        durationMs: durationOf(job?.id),
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    logger.info(
      {
        jobId: job.id,
        tool: job.data.toolName,
        sources: job.data.sources,
        idempotencyKey: job.data.idempotencyKey,
        durationMs: durationOf(job.id),
      },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", () => onSignal("SIGINT"));
  process.once("SIGTERM", () => onSignal("SIGTERM"));

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
