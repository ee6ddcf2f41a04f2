export type Language = "es" | "en";

export type FindingConfidence = "high" | "medium" | "low";

export type Finding = {
  bulletPoint: string;
  reasoning: string;
  dataSource: string[];
  confidence: FindingConfidence;
};

export type AnalysisType = "single_source" | "multi_source";

/**
 * Canonical findings shape; `heatmapAnalysis` is always present once a result leaves the parser.
 */
export type NormalizedFindings = {
  executiveSummary: string;
  principalFindings: Finding[];
  pcaAnalysis: string;
  heatmapAnalysis: string;
  temporalAnalysis?: string;
  seasonalAnalysis?: string;
  fourierAnalysis?: string;
  confidenceScore: number;
  modelUsed: string;
  dataPointsAnalyzed: number;
  analysisType: AnalysisType;
  responseTimeMs?: number;
};

/**
 * Content fields arrive from models either as prose or as nested JSON.
 */
export type FindingContent =
  | { kind: "text"; text: string }
  | { kind: "structured"; value: Record<string, unknown> | unknown[] };

const preferredTextKeys = ["analysis", "text", "content", "summary"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const toFindingContent = (value: unknown): FindingContent | null => {
  if (typeof value === "string") {
    return { kind: "text", text: value };
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return { kind: "text", text: String(value) };
  }

  if (Array.isArray(value) || isRecord(value)) {
    return { kind: "structured", value };
  }

  return null;
};

const hasText = (text: string): boolean => text.trim().length > 0;

/**
 * The single coercion point from model content to display text. Text passes through as written.
 */
export const contentToText = (content: FindingContent | null): string => {
  if (!content) {
    return "";
  }

  if (content.kind === "text") {
    return content.text;
  }

  if (Array.isArray(content.value)) {
    return content.value
      .map((item) => contentToText(toFindingContent(item)))
      .filter(hasText)
      .join("\n\n");
  }

  const record = content.value;
  for (const key of preferredTextKeys) {
    const candidate = record[key];
    if (typeof candidate === "string" && candidate.trim()) {
      return candidate;
    }
  }

  return Object.values(record)
    .map((item) => contentToText(toFindingContent(item)))
    .filter(hasText)
    .join("\n\n");
};
