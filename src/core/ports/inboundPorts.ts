import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { SourceSeries } from "../entities/series";
import type { SourceEntry, ToolEntry } from "../entities/catalog";

export type SeriesRequest = {
  toolName: string;
  sources: string[];
};

/**
 * Keyword to series lookup; storage and retrieval details stay behind this port.
 */
export interface SeriesProviderPort {
  fetchSeries(
    request: SeriesRequest,
  ): Promise<Result<SourceSeries[], AppBoundaryError>>;
}

/**
 * Resolves user-facing tool and source names to their catalog entries.
 */
export interface CatalogPort {
  resolveTool(name: string): ToolEntry | null;
  resolveSource(name: string): SourceEntry | null;
  listTools(): ToolEntry[];
  listSources(): SourceEntry[];
}
