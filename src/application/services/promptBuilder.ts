import type {
  AnalysisFeatures,
  CrossSourceFeatures,
  SingleSourceFeatures,
  SubAnalysis,
} from "../../core/entities/features";
import type { Language } from "../../core/entities/findings";
import type { ChatMessage } from "../../core/entities/modelCall";

export type PromptInput = {
  toolName: string;
  sources: string[];
  language: Language;
  features: AnalysisFeatures;
};

const systemPrompts: Record<Language, string> = {
  es: [
    "Eres un analista experto en herramientas de gestión empresarial.",
    "Interpretas resultados estadísticos reales (tendencias, estacionalidad, PCA, correlaciones) con rigor académico.",
    "Respondes SIEMPRE en español y SOLO con un objeto JSON válido, sin texto adicional ni bloques de código.",
  ].join(" "),
  en: [
    "You are an expert analyst of management tools.",
    "You interpret real statistical results (trends, seasonality, PCA, correlations) with academic rigor.",
    "You ALWAYS answer in English and ONLY with a valid JSON object, with no extra text or code fences.",
  ].join(" "),
};

const labels = {
  es: {
    multiTitle: "ANÁLISIS NARRATIVO MULTI-FUENTE - HERRAMIENTAS DE GESTIÓN",
    singleTitle: "ANÁLISIS TEMPORAL DE FUENTE ÚNICA - HERRAMIENTAS DE GESTIÓN",
    tool: "Herramienta analizada",
    sources: "Fuentes de datos",
    period: "Período",
    points: "Puntos de datos",
    quality: "Calidad de datos (0-100)",
    unavailable: "no disponible",
    results: "RESULTADOS PARA INTERPRETAR",
    format: "FORMATO DE RESPUESTA (JSON)",
    rules:
      "Interprete los resultados reales; no invente cifras. Cada hallazgo debe citar la fuente que lo respalda.",
  },
  en: {
    multiTitle: "MULTI-SOURCE NARRATIVE ANALYSIS - MANAGEMENT TOOLS",
    singleTitle: "SINGLE-SOURCE TEMPORAL ANALYSIS - MANAGEMENT TOOLS",
    tool: "Tool analyzed",
    sources: "Data sources",
    period: "Period",
    points: "Data points",
    quality: "Data quality (0-100)",
    unavailable: "not available",
    results: "RESULTS TO INTERPRET",
    format: "RESPONSE FORMAT (JSON)",
    rules:
      "Interpret the actual results; do not invent figures. Every finding must cite the source that supports it.",
  },
} as const;

const fixed = (value: number, digits = 3): string =>
  Number.isFinite(value) ? value.toFixed(digits) : "n/a";

const describe = <T>(
  analysis: SubAnalysis<T>,
  language: Language,
  render: (value: T) => string[],
): string[] =>
  analysis.match(render, (issue) => [
    `  (${labels[language].unavailable}: ${issue.message})`,
  ]);

const singleSourceLines = (
  detail: SingleSourceFeatures,
  language: Language,
): string[] => [
  "Temporal:",
  ...describe(detail.temporal, language, (trend) => [
    `  slope=${fixed(trend.linearTrend.slope)} r2=${fixed(trend.linearTrend.rSquared)} p=${fixed(trend.linearTrend.pValue, 4)} direction=${trend.linearTrend.direction} (${trend.linearTrend.significance})`,
    `  recent_vs_historical=${fixed(trend.recentVsHistorical.changePercentage, 1)}% volatility=${fixed(trend.volatility.overall)} (${trend.volatility.trend})`,
  ]),
  "Seasonal:",
  ...describe(detail.seasonal, language, (seasonal) => [
    `  strength=${fixed(seasonal.strength)} (${seasonal.strengthLevel}) peak_month=${seasonal.peakMonth} low_month=${seasonal.lowMonth} yoy=${fixed(seasonal.yearOverYearGrowth, 1)}%`,
  ]),
  "Fourier:",
  ...describe(detail.frequency, language, (frequency) => [
    ...frequency.dominantFrequencies.map(
      (bin) =>
        `  period=${fixed(bin.period, 1)} pattern=${bin.pattern} relative_strength=${fixed(bin.relativeStrength)}`,
    ),
    `  signal_to_noise=${fixed(frequency.signalToNoise, 2)} (${frequency.quality})`,
  ]),
];

const crossSourceLines = (
  detail: CrossSourceFeatures,
  language: Language,
): string[] => [
  "PCA:",
  ...describe(detail.pca, language, (pca) => [
    `  total_variance_explained=${fixed(pca.totalVarianceExplained, 1)}% components=${pca.componentCount}`,
    ...pca.components.map(
      (component) =>
        `  ${component.label} variance=${fixed(component.varianceExplained, 1)}% pattern=${component.pattern} loadings: ${component.contributions
          .map(
            (contribution) =>
              `${contribution.source}=${fixed(contribution.loading)} (${contribution.role})`,
          )
          .join(", ")}`,
    ),
  ]),
  "Correlations:",
  ...detail.correlations.map(
    (entry) =>
      `  ${entry.left} ~ ${entry.right}: r=${fixed(entry.r)} ${entry.strength} (${entry.significance})`,
  ),
  "Heatmap:",
  ...describe(detail.heatmap, language, (heatmap) => [
    `  dense: ${heatmap.denseRegions.map((entry) => `${entry.left}/${entry.right}`).join(", ") || "-"}`,
    `  sparse: ${heatmap.sparseRegions.map((entry) => `${entry.left}/${entry.right}`).join(", ") || "-"}`,
    `  clusters: ${heatmap.clusters.map((cluster) => `${cluster.source} -> ${cluster.correlatedWith.join("+")}`).join("; ") || "-"}`,
    `  outliers: ${heatmap.outliers.map((outlier) => `${outlier.source} (${outlier.profile})`).join(", ") || "-"}`,
    `  gradients: ${heatmap.gradients.map((gradient) => `${gradient.left}/${gradient.right} ${gradient.direction} ${fixed(gradient.early)} -> ${fixed(gradient.late)}`).join("; ") || "-"}`,
  ]),
];

const responseFormat = (single: boolean): string => {
  const keys = single
    ? [
        '"executive_summary": "..."',
        '"principal_findings": [{"bullet_point": "...", "reasoning": "...", "data_source": ["..."], "confidence": "high|medium|low"}]',
        '"temporal_analysis": "..."',
        '"seasonal_analysis": "..."',
        '"fourier_analysis": "..."',
      ]
    : [
        '"executive_summary": "..."',
        '"principal_findings": [{"bullet_point": "...", "reasoning": "...", "data_source": ["..."], "confidence": "high|medium|low"}]',
        '"pca_analysis": "..."',
        '"heatmap_analysis": "..."',
      ];
  return `{\n  ${keys.join(",\n  ")}\n}`;
};

/**
 * Serializes extracted features into the two-message chat document sent to every candidate model.
 */
export class PromptBuilder {
  build(input: PromptInput): ChatMessage[] {
    return [
      { role: "system", content: systemPrompts[input.language] },
      { role: "user", content: this.userPrompt(input) },
    ];
  }

  userPrompt(input: PromptInput): string {
    const text = labels[input.language];
    const { features } = input;
    const single = features.detail.kind === "single";
    const header = [
      single ? text.singleTitle : text.multiTitle,
      `${text.tool}: ${input.toolName}`,
      `${text.sources}: ${input.sources.join(", ")}`,
      `${text.period}: ${features.summary.start ?? "N/A"} - ${features.summary.end ?? "N/A"}`,
      `${text.points}: ${features.dataPoints}`,
      `${text.quality}: ${fixed(features.quality.overallScore, 1)}`,
    ];

    const statistics = Object.entries(features.statistics).map(
      ([source, stats]) =>
        `  ${source}: n=${stats.count} mean=${fixed(stats.mean)} median=${fixed(stats.median)} std=${fixed(stats.std)} min=${fixed(stats.min)} max=${fixed(stats.max)} q25=${fixed(stats.q25)} q75=${fixed(stats.q75)} skew=${fixed(stats.skewness)} kurt=${fixed(stats.kurtosis)} missing=${fixed(stats.missingPercentage, 1)}%`,
    );
    const trends = Object.entries(features.trends).map(
      ([source, trend]) => `  ${source}: ${trend.classification}`,
    );
    const anomalies = Object.entries(features.anomalies).map(
      ([source, report]) =>
        `  ${source}: ${report.count} (${fixed(report.percentage, 1)}%), max_z=${fixed(report.maxZScore, 2)}`,
    );

    const body =
      features.detail.kind === "single"
        ? singleSourceLines(features.detail, input.language)
        : crossSourceLines(features.detail, input.language);

    return [
      ...header,
      "",
      `=== ${text.results} ===`,
      ...body,
      ...(statistics.length > 0 ? ["Statistics:", ...statistics] : []),
      ...(trends.length > 0 ? ["Trends:", ...trends] : []),
      ...(anomalies.length > 0 ? ["Anomalies:", ...anomalies] : []),
      "",
      text.rules,
      "",
      `=== ${text.format} ===`,
      responseFormat(single),
    ].join("\n");
  }
}
