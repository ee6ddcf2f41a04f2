import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { Language } from "../../core/entities/findings";
import type { CatalogPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  FindingsCacheRepositoryPort,
  IdGeneratorPort,
  PrecomputeJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CacheOrchestratorService } from "./cacheOrchestratorService";
import { resolveRequest } from "./requestKey";

export type PrecomputeRequest = {
  toolName: string;
  sources: string[];
  language: Language;
};

/**
 * Populates the precomputed-findings store: the CLI enqueues, the worker regenerates and upserts.
 */
export class PrecomputeService {
  constructor(
    private readonly queue: QueuePort,
    private readonly catalog: CatalogPort,
    private readonly orchestrator: CacheOrchestratorService,
    private readonly cache: FindingsCacheRepositoryPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  /**
   * Jobs for the same key dedupe within one hour unless `force` is set.
   */
  async enqueue(
    request: PrecomputeRequest,
    force = false,
  ): Promise<Result<PrecomputeJobPayload, AppBoundaryError>> {
    const resolved = resolveRequest(this.catalog, {
      ...request,
      forceRefresh: true,
    });
    if (resolved.isErr()) {
      return err(resolved.error);
    }

    const jobId = this.ids.next();
    const now = this.clock.now();
    const hourBucket = now.toISOString().slice(0, 13);
    const baseKey = `${resolved.value.key.slice(0, 16)}-${hourBucket}`;
    const payload: PrecomputeJobPayload = {
      jobId,
      idempotencyKey: force ? `${baseKey}-force-${jobId}` : baseKey,
      toolName: resolved.value.toolName,
      sources: resolved.value.sources,
      language: resolved.value.language,
      requestedAt: now.toISOString(),
    };

    await this.queue.enqueuePrecompute(payload);
    return ok(payload);
  }

  /**
   * Worker handler; throws so the queue's retry policy applies.
   */
  async run(payload: PrecomputeJobPayload): Promise<void> {
    const resolved = resolveRequest(this.catalog, {
      toolName: payload.toolName,
      sources: payload.sources,
      language: payload.language,
      forceRefresh: true,
    });
    if (resolved.isErr()) {
      throw new Error(`Precompute rejected: ${resolved.error.message}`);
    }

    const generated = await this.orchestrator.generate(resolved.value);
    if (generated.isErr()) {
      throw new Error(`Precompute generation failed: ${generated.error.message}`);
    }

    const { request, findings } = generated.value;
    await this.cache.upsert({
      combinationHash: request.key,
      toolName: request.toolName,
      toolDisplayName: request.toolDisplayName,
      sourcesText: request.sourcesText,
      sourceIds: request.sourceIds,
      language: request.language,
      findings,
    });

    logger.info(
      {
        jobId: payload.jobId,
        key: request.key.slice(0, 12),
        model: findings.modelUsed,
      },
      "Precomputed findings stored",
    );
  }
}
