import { CacheOrchestratorService } from "../services/cacheOrchestratorService";
import { FeatureExtractorService } from "../services/featureExtractorService";
import { FindingsNormalizer } from "../services/findingsNormalizer";
import { ModelCallChain } from "../services/modelCallChain";
import { OutputRecoveryParser } from "../services/outputRecoveryParser";
import { PerformanceTracker } from "../services/performanceTracker";
import { PrecomputeService } from "../services/precomputeService";
import { PromptBuilder } from "../services/promptBuilder";
import { env, loadAppConfig, type AppConfig } from "../../shared/config/env";
import type { SeriesProviderPort } from "../../core/ports/inboundPorts";
import { loadCatalog, type StaticCatalog } from "../../infra/catalog/toolCatalog";
import { createDb } from "../../infra/db/client";
import {
  PostgresFindingsCacheRepository,
  PostgresSeriesRepository,
} from "../../infra/db/repositories";
import { ChatCompletionLlm } from "../../infra/llm/chatCompletionLlm";
import { MockSeriesProvider } from "../../infra/providers/mocks/mockSeriesProvider";
import { BullMqQueue, redisConfigFromUrl } from "../../infra/queue/bullMqQueue";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";

type Database = ReturnType<typeof createDb>["db"];

const createSeriesProvider = (
  config: AppConfig,
  db: Database,
  catalog: StaticCatalog,
): SeriesProviderPort => {
  if (config.seriesProvider === "postgres") {
    return new PostgresSeriesRepository(db, catalog);
  }

  return new MockSeriesProvider();
};

/**
 * Single composition root shared by the CLI and the precompute worker.
 */
export const createRuntime = async (config: AppConfig = loadAppConfig(env)) => {
  const { db, sql } = createDb(config.postgresUrl);
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const catalog = loadCatalog();
  const tracker = new PerformanceTracker();
  const cache = new PostgresFindingsCacheRepository(db);
  const queue = new BullMqQueue(redisConfigFromUrl(config.redisUrl));

  const models = new ModelCallChain(
    new ChatCompletionLlm(config.providers),
    config.modelCall,
    tracker,
  );

  const orchestrator = new CacheOrchestratorService({
    catalog,
    series: createSeriesProvider(config, db, catalog),
    cache,
    extractor: new FeatureExtractorService(config.analysis, clock),
    prompts: new PromptBuilder(),
    models,
    parser: new OutputRecoveryParser(),
    normalizer: new FindingsNormalizer(),
    tracker,
    singleFlight: config.analysis.singleFlight,
  });

  const precompute = new PrecomputeService(
    queue,
    catalog,
    orchestrator,
    cache,
    clock,
    ids,
  );

  return {
    config,
    catalog,
    models,
    orchestrator,
    precompute,
    queue,
    close: async (): Promise<void> => {
      await queue.close();
      await sql.end();
    },
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
