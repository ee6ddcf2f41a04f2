import {
  boolean,
  date,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  real,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const precomputedFindingsTable = pgTable(
  "precomputed_findings",
  {
    id: serial("id").primaryKey(),
    combinationHash: text("combination_hash").notNull(),
    toolName: text("tool_name").notNull(),
    toolDisplayName: text("tool_display_name").notNull(),
    sourcesText: text("sources_text").notNull(),
    sourcesIds: jsonb("sources_ids").$type<number[]>().notNull(),
    sourcesCount: integer("sources_count").notNull(),
    language: text("language").notNull(),
    executiveSummary: text("executive_summary").notNull(),
    principalFindings: jsonb("principal_findings").$type<unknown>().notNull(),
    pcaAnalysis: text("pca_analysis").notNull().default(""),
    heatmapAnalysis: text("heatmap_analysis").notNull().default(""),
    temporalAnalysis: text("temporal_analysis"),
    seasonalAnalysis: text("seasonal_analysis"),
    fourierAnalysis: text("fourier_analysis"),
    analysisType: text("analysis_type").notNull(),
    dataPointsAnalyzed: integer("data_points_analyzed").notNull(),
    confidenceScore: real("confidence_score").notNull(),
    modelUsed: text("model_used").notNull(),
    responseTimeMs: integer("response_time_ms"),
    isActive: boolean("is_active").notNull().default(true),
    accessCount: integer("access_count").notNull().default(0),
    computationTimestamp: timestamp("computation_timestamp", {
      withTimezone: true,
    })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    combinationHashIdx: uniqueIndex("precomputed_findings_hash_uidx").on(
      table.combinationHash,
    ),
    toolLanguageIdx: index("precomputed_findings_tool_lang_idx").on(
      table.toolName,
      table.language,
    ),
  }),
);

export const seriesPointsTable = pgTable(
  "series_points",
  {
    id: serial("id").primaryKey(),
    toolName: text("tool_name").notNull(),
    sourceId: integer("source_id").notNull(),
    observedOn: date("observed_on", { mode: "date" }).notNull(),
    value: doublePrecision("value").notNull(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("series_points_natural_uidx").on(
      table.toolName,
      table.sourceId,
      table.observedOn,
    ),
  }),
);
