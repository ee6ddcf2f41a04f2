import { createHash } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import type { AnalysisRequest, ResolvedRequest } from "../../core/entities/analysis";
import type { AppBoundaryError } from "../../core/entities/appError";
import { toolLabel } from "../../core/entities/catalog";
import type { Language } from "../../core/entities/findings";
import type { CatalogPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * JSON string literal with every non-ASCII code unit written as \uXXXX.
 */
export const asciiJsonString = (value: string): string =>
  JSON.stringify(value).replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );

/**
 * Sorted-key document with `", "` and `": "` separators, byte-compatible with keys written by the population job.
 */
export const canonicalKeyDocument = (
  toolName: string,
  sourcesText: string,
  language: Language,
): string =>
  `{"language": ${asciiJsonString(language)}, "sources_text": ${asciiJsonString(
    sourcesText,
  )}, "tool_name": ${asciiJsonString(toolName)}}`;

export const canonicalKey = (
  toolName: string,
  sourcesText: string,
  language: Language,
): string =>
  createHash("sha256")
    .update(canonicalKeyDocument(toolName, sourcesText, language), "utf8")
    .digest("hex");

/**
 * Translates tool and sources to their canonical forms and derives the cache key.
 * Unknown sources are dropped; a request with none left fails.
 */
export const resolveRequest = (
  catalog: CatalogPort,
  request: AnalysisRequest,
): Result<ResolvedRequest, AppBoundaryError> => {
  const tool = catalog.resolveTool(request.toolName);
  const toolName = tool?.es ?? request.toolName.trim();
  if (!tool) {
    logger.warn({ tool: request.toolName }, "Tool not in catalog, using name as given");
  }

  const unknown = request.sources.filter((name) => !catalog.resolveSource(name));
  if (unknown.length > 0) {
    logger.warn({ unknown }, "Dropping unknown sources");
  }

  const resolved = catalog
    .listSources()
    .filter((source) =>
      request.sources.some((name) => catalog.resolveSource(name)?.id === source.id),
    );

  if (resolved.length === 0) {
    return err({
      source: "analysis",
      code: "source_not_found",
      provider: "catalog",
      message: `No known source among: ${request.sources.join(", ") || "(none)"}.`,
      retryable: false,
    });
  }

  const sources = resolved.map((source) => source.display);
  const sourcesText = sources.join(", ");

  return ok({
    toolName,
    toolDisplayName: tool ? toolLabel(tool, request.language) : toolName,
    sources,
    sourceIds: resolved.map((source) => source.id),
    sourcesText,
    language: request.language,
    key: canonicalKey(toolName, sourcesText, request.language),
  });
};
