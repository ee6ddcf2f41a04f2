import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CacheRecord } from "../entities/analysis";
import type { Language, NormalizedFindings } from "../entities/findings";
import type { Completion, CompletionRequest } from "../entities/modelCall";

export type PrecomputeJobPayload = {
  jobId: string;
  /** Doubles as the BullMQ job id, so it must not contain a colon. */
  idempotencyKey: string;
  toolName: string;
  sources: string[];
  language: Language;
  requestedAt: string;
};

export interface QueuePort {
  enqueuePrecompute(payload: PrecomputeJobPayload): Promise<void>;
}

export type CacheRecordWrite = {
  combinationHash: string;
  toolName: string;
  toolDisplayName: string;
  sourcesText: string;
  sourceIds: number[];
  language: Language;
  findings: NormalizedFindings;
};

export interface FindingsCacheRepositoryPort {
  findActive(combinationHash: string): Promise<CacheRecord | null>;
  upsert(record: CacheRecordWrite): Promise<void>;
}

export interface ChatCompletionPort {
  complete(
    request: CompletionRequest,
  ): Promise<Result<Completion, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
