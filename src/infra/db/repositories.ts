import { and, asc, eq, inArray, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { err, ok, ResultAsync, type Result } from "neverthrow";
import { z } from "zod";
import type { CacheRecord } from "../../core/entities/analysis";
import {
  toErrorMessage,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { SourceSeries } from "../../core/entities/series";
import type {
  CatalogPort,
  SeriesProviderPort,
  SeriesRequest,
} from "../../core/ports/inboundPorts";
import type {
  CacheRecordWrite,
  FindingsCacheRepositoryPort,
} from "../../core/ports/outboundPorts";
import { precomputedFindingsTable, seriesPointsTable } from "./schema";

type Database = PostgresJsDatabase<Record<string, never>>;

const storedFindingsSchema = z.array(
  z.object({
    bulletPoint: z.string(),
    reasoning: z.string(),
    dataSource: z.array(z.string()),
    confidence: z.enum(["high", "medium", "low"]),
  }),
);

const languageSchema = z.enum(["es", "en"]);
const analysisTypeSchema = z.enum(["single_source", "multi_source"]);

type FindingsRow = typeof precomputedFindingsTable.$inferSelect;

/**
 * Row to CacheRecord; jsonb and enum-like text columns are validated rather than trusted.
 */
export const toCacheRecord = (row: FindingsRow): CacheRecord => ({
  combinationHash: row.combinationHash,
  toolName: row.toolName,
  sourcesText: row.sourcesText,
  language: languageSchema.parse(row.language),
  isActive: row.isActive,
  computedAt: row.computationTimestamp,
  findings: {
    executiveSummary: row.executiveSummary,
    principalFindings: storedFindingsSchema.parse(row.principalFindings),
    pcaAnalysis: row.pcaAnalysis,
    heatmapAnalysis: row.heatmapAnalysis,
    ...(row.temporalAnalysis !== null
      ? { temporalAnalysis: row.temporalAnalysis }
      : {}),
    ...(row.seasonalAnalysis !== null
      ? { seasonalAnalysis: row.seasonalAnalysis }
      : {}),
    ...(row.fourierAnalysis !== null
      ? { fourierAnalysis: row.fourierAnalysis }
      : {}),
    confidenceScore: row.confidenceScore,
    modelUsed: row.modelUsed,
    dataPointsAnalyzed: row.dataPointsAnalyzed,
    analysisType: analysisTypeSchema.parse(row.analysisType),
    ...(row.responseTimeMs !== null ? { responseTimeMs: row.responseTimeMs } : {}),
  },
});

/**
 * Precomputed findings keyed by canonical combination hash; one active row per key.
 */
export class PostgresFindingsCacheRepository
  implements FindingsCacheRepositoryPort
{
  constructor(private readonly db: Database) {}

  async findActive(combinationHash: string): Promise<CacheRecord | null> {
    const [row] = await this.db
      .select()
      .from(precomputedFindingsTable)
      .where(
        and(
          eq(precomputedFindingsTable.combinationHash, combinationHash),
          eq(precomputedFindingsTable.isActive, true),
        ),
      )
      .limit(1);

    return row ? toCacheRecord(row) : null;
  }

  /**
   * Regeneration replaces content and reactivates the row.
   */
  async upsert(record: CacheRecordWrite): Promise<void> {
    const { findings } = record;
    await this.db
      .insert(precomputedFindingsTable)
      .values({
        combinationHash: record.combinationHash,
        toolName: record.toolName,
        toolDisplayName: record.toolDisplayName,
        sourcesText: record.sourcesText,
        sourcesIds: record.sourceIds,
        sourcesCount: record.sourceIds.length,
        language: record.language,
        executiveSummary: findings.executiveSummary,
        principalFindings: findings.principalFindings,
        pcaAnalysis: findings.pcaAnalysis,
        heatmapAnalysis: findings.heatmapAnalysis,
        temporalAnalysis: findings.temporalAnalysis ?? null,
        seasonalAnalysis: findings.seasonalAnalysis ?? null,
        fourierAnalysis: findings.fourierAnalysis ?? null,
        analysisType: findings.analysisType,
        dataPointsAnalyzed: findings.dataPointsAnalyzed,
        confidenceScore: findings.confidenceScore,
        modelUsed: findings.modelUsed,
        responseTimeMs: findings.responseTimeMs ?? null,
        isActive: true,
      })
      .onConflictDoUpdate({
        target: precomputedFindingsTable.combinationHash,
        set: {
          executiveSummary: sql`excluded.executive_summary`,
          principalFindings: sql`excluded.principal_findings`,
          pcaAnalysis: sql`excluded.pca_analysis`,
          heatmapAnalysis: sql`excluded.heatmap_analysis`,
          temporalAnalysis: sql`excluded.temporal_analysis`,
          seasonalAnalysis: sql`excluded.seasonal_analysis`,
          fourierAnalysis: sql`excluded.fourier_analysis`,
          dataPointsAnalyzed: sql`excluded.data_points_analyzed`,
          confidenceScore: sql`excluded.confidence_score`,
          modelUsed: sql`excluded.model_used`,
          responseTimeMs: sql`excluded.response_time_ms`,
          isActive: true,
          computationTimestamp: sql`now()`,
        },
      });
  }
}

/**
 * Keyword to series lookup over `series_points`, one series per requested source.
 */
export class PostgresSeriesRepository implements SeriesProviderPort {
  constructor(
    private readonly db: Database,
    private readonly catalog: CatalogPort,
  ) {}

  async fetchSeries(
    request: SeriesRequest,
  ): Promise<Result<SourceSeries[], AppBoundaryError>> {
    const sources = request.sources.flatMap((name) => {
      const source = this.catalog.resolveSource(name);
      return source ? [{ name, id: source.id }] : [];
    });
    if (sources.length === 0) {
      return err({
        source: "series",
        code: "source_not_found",
        provider: "postgres",
        message: `No catalog source among: ${request.sources.join(", ")}.`,
        retryable: false,
      });
    }

    const rows = await ResultAsync.fromPromise(
      this.db
        .select()
        .from(seriesPointsTable)
        .where(
          and(
            eq(seriesPointsTable.toolName, request.toolName),
            inArray(
              seriesPointsTable.sourceId,
              sources.map((source) => source.id),
            ),
          ),
        )
        .orderBy(asc(seriesPointsTable.observedOn)),
      (error): AppBoundaryError => ({
        source: "series",
        code: "provider_error",
        provider: "postgres",
        message: toErrorMessage(error),
        retryable: true,
        cause: error,
      }),
    );
    if (rows.isErr()) {
      return err(rows.error);
    }

    return ok(
      sources.map(({ name, id }) => ({
        source: name,
        points: rows.value
          .filter((row) => row.sourceId === id)
          .map((row) => ({ date: row.observedOn, value: row.value })),
      })),
    );
  }
}
