import type { Language, NormalizedFindings } from "./findings";

export type AnalysisRequest = {
  toolName: string;
  sources: string[];
  language: Language;
  forceRefresh: boolean;
};

export type ResultSource = "precomputed" | "fresh_generation";

export type AnalysisResponse =
  | {
      success: true;
      data: NormalizedFindings;
      cacheHit: boolean;
      responseTimeMs: number;
      source: ResultSource;
      error: null;
    }
  | {
      success: false;
      data: null;
      cacheHit: false;
      responseTimeMs: number;
      source: null;
      error: string;
    };

/**
 * Tool and sources after catalog resolution; the inputs to the canonical key.
 */
export type ResolvedRequest = {
  toolName: string;
  toolDisplayName: string;
  sources: string[];
  sourceIds: number[];
  sourcesText: string;
  language: Language;
  key: string;
};

/**
 * A persisted findings row as read from the precomputed store.
 */
export type CacheRecord = {
  combinationHash: string;
  toolName: string;
  sourcesText: string;
  language: Language;
  findings: NormalizedFindings;
  isActive: boolean;
  computedAt: Date;
};
