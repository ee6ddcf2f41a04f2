import { Command, Option } from "commander";
import { z } from "zod";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { Language } from "../core/entities/findings";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatAnalysisReport, formatProbeReport } from "./report";

const languageSchema = z.enum(["es", "en"]);

const parseLanguage = (value: string): Language => languageSchema.parse(value);

const parseSources = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

const languageOption = () =>
  new Option("--language <language>", "Output language (es|en)")
    .argParser(parseLanguage)
    .default(env.APP_LANGUAGE);

type AnalyzeOptions = {
  tool: string;
  sources: string[];
  language: Language;
  force?: boolean;
  prettify?: boolean;
  stats?: boolean;
};

type PrecomputeOptions = {
  tool: string;
  sources: string[];
  language: Language;
  force?: boolean;
};

/**
 * Command surface over the same runtime the worker uses.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("tool-insights")
    .description("Management tool adoption analysis CLI");

  cli
    .command("analyze")
    .description("Return findings for a tool and source combination")
    .requiredOption("--tool <name>", "Tool name (Spanish or English)")
    .requiredOption("--sources <list>", "Comma-separated sources", parseSources)
    .addOption(languageOption())
    .option("--force", "Skip the precomputed store and regenerate")
    .option("--prettify", "Render a human-friendly report")
    .option("--stats", "Log performance counters after the request")
    .action(async (opts: AnalyzeOptions) => {
      const runtime = await createRuntime();
      const response = await runtime.orchestrator.analyze({
        toolName: opts.tool,
        sources: opts.sources,
        language: opts.language,
        forceRefresh: Boolean(opts.force),
      });

      if (opts.prettify) {
        console.log(formatAnalysisReport(response));
      } else {
        console.log(JSON.stringify(response, null, 2));
      }
      if (opts.stats) {
        logger.info(
          { metrics: runtime.orchestrator.getPerformanceMetrics() },
          "Performance metrics",
        );
      }

      await runtime.close();
      process.exit(response.success ? 0 : 1);
    });

  cli
    .command("precompute")
    .description("Enqueue a background regeneration for the precomputed store")
    .requiredOption("--tool <name>", "Tool name (Spanish or English)")
    .requiredOption("--sources <list>", "Comma-separated sources", parseSources)
    .addOption(languageOption())
    .option("--force", "Bypass hourly idempotency dedupe for immediate reruns")
    .action(async (opts: PrecomputeOptions) => {
      const runtime = await createRuntime();
      const result = await runtime.precompute.enqueue(
        {
          toolName: opts.tool,
          sources: opts.sources,
          language: opts.language,
        },
        Boolean(opts.force),
      );
      await runtime.close();

      if (result.isErr()) {
        logger.error({ error: result.error.message }, "Precompute rejected");
        process.exit(1);
      }

      logger.info(
        {
          jobId: result.value.jobId,
          idempotencyKey: result.value.idempotencyKey,
          tool: result.value.toolName,
          sources: result.value.sources,
        },
        "Enqueued precompute job",
      );
      process.exit(0);
    });

  cli
    .command("status")
    .description("Report precompute queue backlog and configuration")
    .action(async () => {
      const runtime = await createRuntime();
      const queueCounts = await runtime.queue.getQueueCounts();

      logger.info(
        {
          queueCounts,
          language: runtime.config.language,
          seriesProvider: runtime.config.seriesProvider,
          singleFlight: runtime.config.analysis.singleFlight,
          providers: runtime.config.providers.map((provider) => provider.name),
          candidates: runtime.config.modelCall.candidates.map(
            (candidate) => `${candidate.provider}/${candidate.model}`,
          ),
        },
        "Runtime status",
      );
      await runtime.close();
      process.exit(0);
    });

  cli
    .command("catalog")
    .description("List known tools and sources")
    .addOption(languageOption())
    .action(async (opts: { language: Language }) => {
      const runtime = await createRuntime();
      const tools = runtime.catalog
        .listTools()
        .map((tool) => (opts.language === "en" ? tool.en : tool.es));
      const sources = runtime.catalog
        .listSources()
        .map((source) => (opts.language === "en" ? source.display : source.es));

      console.log(["Tools:", ...tools.map((tool) => `- ${tool}`)].join("\n"));
      console.log(
        ["", "Sources:", ...sources.map((source) => `- ${source}`)].join("\n"),
      );
      await runtime.close();
      process.exit(0);
    });

  cli
    .command("probe-models")
    .description("Send a tiny prompt to every configured model candidate")
    .action(async () => {
      const runtime = await createRuntime();
      const probes = await runtime.models.probeModels();
      console.log(formatProbeReport(probes));
      await runtime.close();
      process.exit(probes.some((probe) => probe.available) ? 0 : 1);
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
