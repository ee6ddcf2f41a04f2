import { err, ok, type Result } from "neverthrow";
import {
  contentToText,
  toFindingContent,
  type Finding,
  type FindingConfidence,
  type Language,
} from "../../core/entities/findings";
import { logger } from "../../shared/logger/logger";

/**
 * Findings content as recovered from model text, before system metadata is attached.
 * `claimed` keeps whatever operational metadata the model wrote about itself.
 */
export type ParsedFindings = {
  executiveSummary: string;
  principalFindings: Finding[];
  pcaAnalysis: string;
  heatmapAnalysis: string;
  temporalAnalysis?: string;
  seasonalAnalysis?: string;
  fourierAnalysis?: string;
  claimed: {
    modelUsed?: string;
    responseTimeMs?: number;
    dataPointsAnalyzed?: number;
  };
};

export type SectionName =
  | "executive_summary"
  | "principal_findings"
  | "pca_analysis"
  | "heatmap_analysis";

export type ParseOutcome =
  | { kind: "direct"; findings: ParsedFindings }
  | {
      kind: "repaired";
      repair: "truncated_object" | "bullet_wrapped";
      findings: ParsedFindings;
    }
  | { kind: "section_combined"; sections: SectionName[]; findings: ParsedFindings }
  | { kind: "fragment_merged"; fragments: number; findings: ParsedFindings }
  | { kind: "fallback"; findings: ParsedFindings };

type Strategy = {
  name: string;
  run: (text: string) => Result<ParseOutcome, string>;
};

export const heatmapPlaceholders: Record<Language, string> = {
  es: "Análisis de correlación no disponible en la respuesta de IA.",
  en: "Correlation analysis not available in the AI response.",
};

const DEFAULT_SOURCE = ["AI Analysis"];

const sectionHeaders: Array<[SectionName, string[]]> = [
  [
    "executive_summary",
    ["📋 Resumen Ejecutivo", "📋 Executive Summary", "Resumen Ejecutivo", "Executive Summary"],
  ],
  [
    "principal_findings",
    [
      "🔍 Hallazgos Principales",
      "🔍 Principal Findings",
      "Hallazgos Principales",
      "Principal Findings",
    ],
  ],
  ["pca_analysis", ["📊 Análisis PCA", "📊 PCA Analysis", "Análisis PCA", "PCA Analysis"]],
  [
    "heatmap_analysis",
    [
      "🔥 Análisis del Mapa de Calor",
      "🔥 Heatmap Analysis",
      "Análisis del Mapa de Calor",
      "Heatmap Analysis",
    ],
  ],
];

const canonicalKeys = [
  "executive_summary",
  "principal_findings",
  "pca_analysis",
  "pca_insights",
  "heatmap_analysis",
  "temporal_analysis",
  "seasonal_analysis",
  "fourier_analysis",
] as const;

const FRAGMENT_PATTERN = /\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\}/g;
const EXECUTIVE_SUMMARY_PATTERN = /"executive_summary":\s*"((?:[^"\\]|\\.)*)"/;
const LOOSE_SUMMARY_PATTERN = /"executive_summary":\s*"(.*?)"/s;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseJson = (text: string): Result<unknown, string> => {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
};

const parseRecord = (text: string): Result<Record<string, unknown>, string> =>
  parseJson(text).andThen((value) =>
    isRecord(value) ? ok(value) : err("decoded value is not an object"),
  );

export const stripCodeFence = (raw: string): string => {
  let text = raw.trim();
  if (text.startsWith("```json")) {
    text = text.slice(7);
  } else if (text.startsWith("```")) {
    text = text.slice(3);
  }
  if (text.endsWith("```")) {
    text = text.slice(0, -3);
  }
  return text.trim();
};

const emptyFindings = (): ParsedFindings => ({
  executiveSummary: "",
  principalFindings: [],
  pcaAnalysis: "",
  heatmapAnalysis: "",
  claimed: {},
});

const textOf = (value: unknown): string => contentToText(toFindingContent(value));

const optionalText = (value: unknown): string | undefined =>
  value === undefined || value === null ? undefined : textOf(value);

const lowConfidence = (bulletPoint: string, reasoning: string): Finding => ({
  bulletPoint,
  reasoning,
  dataSource: DEFAULT_SOURCE,
  confidence: "low",
});

const confidenceOf = (value: unknown): FindingConfidence =>
  value === "high" || value === "medium" || value === "low" ? value : "medium";

const findingFrom = (item: unknown): Finding | null => {
  if (typeof item === "string") {
    return item.trim()
      ? {
          bulletPoint: item,
          reasoning: "Generated by AI",
          dataSource: DEFAULT_SOURCE,
          confidence: "medium",
        }
      : null;
  }

  if (!isRecord(item)) {
    return null;
  }

  const bulletPoint = textOf(item.bullet_point ?? item.bulletPoint ?? item.finding);
  if (!bulletPoint.trim()) {
    return null;
  }

  const reasoning = textOf(item.reasoning);
  const source = item.data_source ?? item.dataSource;
  return {
    bulletPoint,
    reasoning: reasoning.trim() ? reasoning : "Generated by AI",
    dataSource: Array.isArray(source)
      ? source.filter((entry): entry is string => typeof entry === "string")
      : typeof source === "string"
        ? [source]
        : DEFAULT_SOURCE,
    confidence: confidenceOf(item.confidence),
  };
};

const findingsFrom = (value: unknown): Finding[] => {
  const items = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return items.flatMap((item) => {
    const finding = findingFrom(item);
    return finding ? [finding] : [];
  });
};

const pcaFrom = (record: Record<string, unknown>): string => {
  if (record.pca_analysis !== undefined) {
    return textOf(record.pca_analysis);
  }
  const insights = record.pca_insights;
  if (isRecord(insights) && insights.analysis !== undefined) {
    return textOf(insights.analysis);
  }
  return textOf(insights);
};

/**
 * Maps a decoded model object onto the canonical field names.
 */
export const findingsFromRecord = (
  record: Record<string, unknown>,
): ParsedFindings => ({
  executiveSummary: textOf(record.executive_summary),
  principalFindings: findingsFrom(record.principal_findings),
  pcaAnalysis: pcaFrom(record),
  heatmapAnalysis: textOf(record.heatmap_analysis),
  temporalAnalysis: optionalText(record.temporal_analysis),
  seasonalAnalysis: optionalText(record.seasonal_analysis),
  fourierAnalysis: optionalText(record.fourier_analysis),
  claimed: {
    modelUsed:
      typeof record.model_used === "string" ? record.model_used : undefined,
    responseTimeMs:
      typeof record.response_time_ms === "number"
        ? record.response_time_ms
        : undefined,
    dataPointsAnalyzed:
      typeof record.data_points_analyzed === "number"
        ? record.data_points_analyzed
        : undefined,
  },
});

const hasContent = (findings: ParsedFindings): boolean =>
  Boolean(
    findings.executiveSummary ||
      findings.principalFindings.length > 0 ||
      findings.pcaAnalysis ||
      findings.heatmapAnalysis ||
      findings.temporalAnalysis ||
      findings.seasonalAnalysis ||
      findings.fourierAnalysis,
  );

const direct: Strategy = {
  name: "direct",
  run: (text) => {
    if (!(text.startsWith("{") && text.endsWith("}"))) {
      return err("not brace-delimited");
    }
    return parseRecord(text).map((record) => ({
      kind: "direct" as const,
      findings: findingsFromRecord(record),
    }));
  },
};

const quoteCount = (text: string): number => text.split('"').length - 1;

const truncatedObject: Strategy = {
  name: "truncated_object",
  run: (text) => {
    const looksTruncated =
      text.startsWith('{"executive_summary":') &&
      text.includes('"principal_findings":') &&
      (text.includes('"•') || quoteCount(text) % 2 === 1) &&
      !text.endsWith("}");
    if (!looksTruncated) {
      return err("not a truncated findings object");
    }

    const summary = EXECUTIVE_SUMMARY_PATTERN.exec(text)?.[1]?.replace(/\\"/g, '"') ?? "";
    const afterKey = text.slice(text.indexOf('"principal_findings":'));
    const bracket = afterKey.indexOf("[");
    const fragment =
      bracket === -1
        ? ""
        : afterKey
            .slice(bracket + 1)
            .trim()
            .replace(/^"?\s*•?\s*/, "")
            .replace(/",?\s*$/, "")
            .replace(/\\"/g, '"')
            .trim();

    if (!summary && !fragment) {
      return err("nothing recoverable in truncated object");
    }

    return ok({
      kind: "repaired" as const,
      repair: "truncated_object" as const,
      findings: {
        ...emptyFindings(),
        executiveSummary: summary,
        principalFindings: fragment
          ? [lowConfidence(fragment, "Extracted from truncated AI response")]
          : [],
      },
    });
  },
};

const unwrapBullet = (text: string): string => {
  let inner = text.replace(/^•\s*/, "").trim();
  if (inner.startsWith('"') && inner.slice(1).trimStart().startsWith("{")) {
    inner = inner.slice(1).trim();
  }
  if (inner.endsWith('"') && inner.slice(0, -1).trimEnd().endsWith("}")) {
    inner = inner.slice(0, -1).trim();
  }
  return inner;
};

const bulletWrapped: Strategy = {
  name: "bullet_wrapped",
  run: (text) => {
    if (!(text.startsWith("•") && text.includes('"executive_summary":'))) {
      return err("not a bullet-wrapped object");
    }

    const inner = unwrapBullet(text);
    const closing = quoteCount(inner) % 2 === 1 ? '"}' : "}";
    const decoded = parseRecord(inner).orElse(() =>
      inner.endsWith("}") ? err("still invalid") : parseRecord(`${inner}${closing}`),
    );

    if (decoded.isOk()) {
      return ok({
        kind: "repaired" as const,
        repair: "bullet_wrapped" as const,
        findings: findingsFromRecord(decoded.value),
      });
    }

    const summary = LOOSE_SUMMARY_PATTERN.exec(inner)?.[1];
    if (!summary) {
      return err("no executive summary inside bullet");
    }

    return ok({
      kind: "repaired" as const,
      repair: "bullet_wrapped" as const,
      findings: {
        ...emptyFindings(),
        executiveSummary: summary.replace(/\\"/g, '"'),
        principalFindings: [
          lowConfidence(
            "Analysis extracted from malformed response",
            "Content extracted from bullet point with JSON fragment",
          ),
        ],
      },
    });
  },
};

const headerKey = (line: string): string =>
  line
    .trim()
    .replace(/^[#*\s]+/, "")
    .replace(/[*:\s]+$/, "")
    .toLowerCase();

const headerLookup = new Map<string, SectionName>(
  sectionHeaders.flatMap(([section, variants]) =>
    variants.map((variant): [string, SectionName] => [variant.toLowerCase(), section]),
  ),
);

/**
 * Splits text into the recognized sections, keyed by the last header seen.
 */
export const splitSections = (text: string): Map<SectionName, string> => {
  const sections = new Map<SectionName, string[]>();
  let current: SectionName | null = null;

  text.split("\n").forEach((line) => {
    const header = headerLookup.get(headerKey(line));
    if (header) {
      current = header;
      sections.set(header, sections.get(header) ?? []);
      return;
    }
    if (current) {
      sections.get(current)?.push(line);
    }
  });

  return new Map(
    [...sections.entries()].map(([name, lines]) => [name, lines.join("\n").trim()]),
  );
};

const embeddedJson = (content: string): Record<string, unknown> | null => {
  const unfenced = stripCodeFence(content);
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  const decoded = parseRecord(unfenced.slice(start, end + 1));
  return decoded.isOk() ? decoded.value : null;
};

const isFragmentLine = (line: string): boolean =>
  line.startsWith("{") ||
  line.startsWith("}") ||
  line.startsWith('"executive_summary":') ||
  line.startsWith("```") ||
  line.startsWith('"•');

const proseOf = (content: string): string =>
  content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line && !isFragmentLine(line))
    .join("\n")
    .trim();

const bulletFindings = (content: string, exclude: string): Finding[] =>
  content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("•"))
    .map((line) => line.slice(1).trim())
    .filter(
      (line) =>
        !isFragmentLine(line) &&
        line.length > 10 &&
        line !== exclude &&
        !line.startsWith("Análisis adicional no disponible"),
    )
    .map((bulletPoint) =>
      lowConfidence(bulletPoint, "Extracted from malformed AI response"),
    );

const sectionRecombination: Strategy = {
  name: "section_combined",
  run: (text) => {
    const sections = splitSections(text);
    if (sections.size === 0) {
      return err("no recognized section headers");
    }

    const findings = emptyFindings();
    const textField = (name: SectionName): string => {
      const content = sections.get(name) ?? "";
      const json = embeddedJson(content);
      if (json && json[name] !== undefined) {
        return textOf(json[name]);
      }
      return proseOf(content);
    };

    findings.executiveSummary = textField("executive_summary");
    findings.pcaAnalysis = textField("pca_analysis");
    findings.heatmapAnalysis = textField("heatmap_analysis");

    const findingsSection = sections.get("principal_findings") ?? "";
    const findingsJson = embeddedJson(findingsSection);
    findings.principalFindings =
      findingsJson && findingsJson.principal_findings !== undefined
        ? findingsFrom(findingsJson.principal_findings)
        : bulletFindings(findingsSection, findings.executiveSummary);

    if (!hasContent(findings)) {
      return err("recognized sections are empty");
    }

    return ok({
      kind: "section_combined" as const,
      sections: [...sections.keys()],
      findings,
    });
  },
};

const fragmentScan: Strategy = {
  name: "fragment_merged",
  run: (text) => {
    const merged: Record<string, unknown> = {};
    let fragments = 0;

    for (const match of text.matchAll(FRAGMENT_PATTERN)) {
      const decoded = parseRecord(match[0]);
      if (decoded.isErr()) {
        continue;
      }
      const recognized = canonicalKeys.filter((key) => key in decoded.value);
      if (recognized.length === 0) {
        continue;
      }
      fragments += 1;
      recognized.forEach((key) => {
        merged[key] = decoded.value[key];
      });
    }

    if (fragments === 0) {
      return err("no decodable fragments with canonical keys");
    }

    return ok({
      kind: "fragment_merged" as const,
      fragments,
      findings: findingsFromRecord(merged),
    });
  },
};

const trimFindings = (findings: ParsedFindings): ParsedFindings => ({
  ...findings,
  executiveSummary: findings.executiveSummary.trim(),
  principalFindings: findings.principalFindings.map((finding) => ({
    ...finding,
    bulletPoint: finding.bulletPoint.trim(),
    reasoning: finding.reasoning.trim(),
  })),
  pcaAnalysis: findings.pcaAnalysis.trim(),
  heatmapAnalysis: findings.heatmapAnalysis.trim(),
  temporalAnalysis: findings.temporalAnalysis?.trim(),
  seasonalAnalysis: findings.seasonalAnalysis?.trim(),
  fourierAnalysis: findings.fourierAnalysis?.trim(),
});

const truncate = (text: string, limit: number): string =>
  text.length > limit ? `${text.slice(0, limit)}...` : text;

const fallback = (text: string): ParseOutcome => ({
  kind: "fallback",
  findings: {
    ...emptyFindings(),
    executiveSummary: truncate(text, 500),
    principalFindings: [
      lowConfidence(truncate(text, 300), "Parsing failed, using raw response"),
    ],
    pcaAnalysis: truncate(text, 400),
    heatmapAnalysis: truncate(text, 400),
  },
});

const strategies: Strategy[] = [
  direct,
  truncatedObject,
  bulletWrapped,
  sectionRecombination,
  fragmentScan,
];

/**
 * Recovers canonical findings from unreliable model text; the first strategy to succeed wins and the last one cannot fail.
 */
export class OutputRecoveryParser {
  parse(rawText: string, language: Language): ParseOutcome {
    const text = stripCodeFence(rawText);
    const failures: Array<{ strategy: string; reason: string }> = [];

    let outcome: ParseOutcome | null = null;
    for (const strategy of strategies) {
      const result = strategy.run(text);
      if (result.isOk()) {
        outcome = result.value;
        break;
      }
      failures.push({ strategy: strategy.name, reason: result.error });
    }

    const recovered = outcome ?? fallback(text);
    // Direct decoding keeps values as the model wrote them; recovered text is trimmed.
    const resolved: ParseOutcome =
      recovered.kind === "direct"
        ? recovered
        : { ...recovered, findings: trimFindings(recovered.findings) };
    if (failures.length > 0) {
      logger.debug(
        { strategy: resolved.kind, skipped: failures },
        "Model output needed recovery",
      );
    }

    return this.withHeatmap(resolved, language);
  }

  private withHeatmap(outcome: ParseOutcome, language: Language): ParseOutcome {
    if (outcome.findings.heatmapAnalysis.trim()) {
      return outcome;
    }
    return {
      ...outcome,
      findings: {
        ...outcome.findings,
        heatmapAnalysis: heatmapPlaceholders[language],
      },
    };
  }
}
