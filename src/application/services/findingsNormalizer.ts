import type {
  AnalysisType,
  NormalizedFindings,
} from "../../core/entities/findings";
import type { ParsedFindings } from "./outputRecoveryParser";

/**
 * Measurements taken by the pipeline itself; these replace anything the model claimed.
 */
export type GenerationMetadata = {
  modelUsed: string;
  responseTimeMs: number;
  dataPointsAnalyzed: number;
  analysisType: AnalysisType;
};

const academicTerms = ["análisis", "componente", "varianza", "carga", "patrón", "tendencia"];
const temporalTerms = ["tendencia", "volatilidad", "momento", "aceleración", "temporal"];
const seasonalTerms = ["estacional", "temporada", "pico", "baja", "ciclo"];
const fourierTerms = ["frecuencia", "período", "espectro", "fourier", "armónico"];

const NUMBER_PATTERN = /[+-]?\d+\.?\d*/g;

const lengthFactor = (text: string, target: number): number =>
  Math.min(text.length / target, 1);

const mentions = (text: string, terms: string[], minimum = 2): boolean => {
  const lowered = text.toLowerCase();
  return terms.filter((term) => lowered.includes(term)).length >= minimum;
};

const averageOr = (factors: number[], fallback: number): number =>
  factors.length > 0
    ? factors.reduce((total, factor) => total + factor, 0) / factors.length
    : fallback;

/**
 * Content-quality heuristic for cross-source reports: narrative length, domain vocabulary and quantitative PCA prose.
 */
export const multiSourceConfidence = (findings: ParsedFindings): number => {
  const factors: number[] = [];

  const findingsText = findings.principalFindings
    .map((finding) => finding.bulletPoint)
    .join("\n");
  if (findingsText) {
    factors.push(lengthFactor(findingsText, 500));
    if (mentions(findingsText, academicTerms)) {
      factors.push(0.8);
    }
  }

  const pca = findings.pcaAnalysis;
  if (pca) {
    factors.push(lengthFactor(pca, 400));
    const paragraphs = pca.split("\n\n").filter((part) => part.trim()).length;
    if (paragraphs >= 3) {
      factors.push(0.8);
    } else if (paragraphs >= 2) {
      factors.push(0.4);
    }
    if ((pca.match(NUMBER_PATTERN) ?? []).length >= 3) {
      factors.push(0.7);
    }
  }

  if (findings.executiveSummary) {
    factors.push(lengthFactor(findings.executiveSummary, 150));
  }

  return averageOr(factors, 0.5);
};

export const singleSourceConfidence = (findings: ParsedFindings): number => {
  const factors: number[] = [];

  if (findings.executiveSummary) {
    factors.push(lengthFactor(findings.executiveSummary, 150));
  }

  const sections: Array<[string | undefined, number, string[]]> = [
    [findings.temporalAnalysis, 300, temporalTerms],
    [findings.seasonalAnalysis, 250, seasonalTerms],
    [findings.fourierAnalysis, 250, fourierTerms],
  ];
  sections.forEach(([text, target, terms]) => {
    if (!text) {
      return;
    }
    factors.push(lengthFactor(text, target));
    if (mentions(text, terms)) {
      factors.push(0.8);
    }
  });

  return averageOr(factors, 0.5);
};

/**
 * Attaches authoritative metadata and enforces that single-source reports carry no PCA or heatmap text.
 */
export class FindingsNormalizer {
  normalize(
    parsed: ParsedFindings,
    metadata: GenerationMetadata,
  ): NormalizedFindings {
    const single = metadata.analysisType === "single_source";

    return {
      executiveSummary: parsed.executiveSummary,
      principalFindings: parsed.principalFindings,
      pcaAnalysis: single ? "" : parsed.pcaAnalysis,
      heatmapAnalysis: single ? "" : parsed.heatmapAnalysis,
      ...(single
        ? {
            temporalAnalysis: parsed.temporalAnalysis ?? "",
            seasonalAnalysis: parsed.seasonalAnalysis ?? "",
            fourierAnalysis: parsed.fourierAnalysis ?? "",
          }
        : {}),
      confidenceScore: single
        ? singleSourceConfidence(parsed)
        : multiSourceConfidence(parsed),
      modelUsed: metadata.modelUsed,
      dataPointsAnalyzed: metadata.dataPointsAnalyzed,
      analysisType: metadata.analysisType,
      responseTimeMs: metadata.responseTimeMs,
    };
  }
}
