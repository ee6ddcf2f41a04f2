import type { AnalysisResponse } from "../core/entities/analysis";
import type { ModelProbe } from "../core/entities/modelCall";

const section = (lines: string[], title: string, body: string | undefined) => {
  if (body === undefined) {
    return;
  }
  lines.push("");
  lines.push(`${title}:`);
  lines.push(body.trim() ? body.trim() : "- none");
};

/**
 * Terminal rendering of an analysis envelope for `analyze --prettify`.
 */
export const formatAnalysisReport = (response: AnalysisResponse): string => {
  if (!response.success) {
    return `Analysis failed after ${response.responseTimeMs} ms: ${response.error}`;
  }

  const { data } = response;
  const lines: string[] = [];

  lines.push(
    `Source: ${response.source}${response.cacheHit ? " (cache hit)" : ""}`,
  );
  lines.push(`Model: ${data.modelUsed}`);
  lines.push(`Type: ${data.analysisType}`);
  lines.push(`Data points: ${data.dataPointsAnalyzed}`);
  lines.push(`Confidence: ${(data.confidenceScore * 100).toFixed(1)}%`);
  lines.push(`Response time: ${response.responseTimeMs} ms`);

  section(lines, "Executive summary", data.executiveSummary);

  lines.push("");
  lines.push("Principal findings:");
  if (data.principalFindings.length === 0) {
    lines.push("- none");
  } else {
    data.principalFindings.forEach((finding, index) => {
      lines.push(`${index + 1}. [${finding.confidence}] ${finding.bulletPoint}`);
      if (finding.reasoning) {
        lines.push(`   ${finding.reasoning}`);
      }
    });
  }

  if (data.analysisType === "multi_source") {
    section(lines, "PCA", data.pcaAnalysis);
    section(lines, "Heatmap", data.heatmapAnalysis);
  }
  section(lines, "Temporal", data.temporalAnalysis);
  section(lines, "Seasonal", data.seasonalAnalysis);
  section(lines, "Fourier", data.fourierAnalysis);

  return lines.join("\n");
};

export const formatProbeReport = (probes: ModelProbe[]): string => {
  if (probes.length === 0) {
    return "No model candidates configured.";
  }

  return probes
    .map(
      (probe) =>
        `${probe.available ? "ok  " : "FAIL"} ${probe.provider}/${probe.model} ${probe.elapsedMs} ms${probe.error ? ` (${probe.error})` : ""}`,
    )
    .join("\n");
};
