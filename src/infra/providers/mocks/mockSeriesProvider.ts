import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { SeriesPoint, SourceSeries } from "../../../core/entities/series";
import type {
  SeriesProviderPort,
  SeriesRequest,
} from "../../../core/ports/inboundPorts";

const seedOf = (text: string): number =>
  [...text].reduce((hash, char) => (hash * 31 + char.charCodeAt(0)) % 9973, 7);

/**
 * Deterministic monthly series per (tool, source): trend plus an annual cycle plus small wobble.
 * Lets the CLI and tests run the full pipeline without a series database.
 */
export class MockSeriesProvider implements SeriesProviderPort {
  constructor(
    private readonly months = 240,
    private readonly start = new Date(Date.UTC(2005, 0, 1)),
  ) {}

  async fetchSeries(
    request: SeriesRequest,
  ): Promise<Result<SourceSeries[], AppBoundaryError>> {
    return ok(
      request.sources.map((source) => ({
        source,
        points: this.points(seedOf(`${request.toolName}|${source}`)),
      })),
    );
  }

  private points(seed: number): SeriesPoint[] {
    const level = 20 + (seed % 40);
    const slope = ((seed % 7) - 3) * 0.05;
    const amplitude = 2 + (seed % 5);
    const phase = (seed % 12) / 12;

    return Array.from({ length: this.months }, (_, index) => ({
      date: new Date(
        Date.UTC(
          this.start.getUTCFullYear(),
          this.start.getUTCMonth() + index,
          1,
        ),
      ),
      value:
        level +
        slope * index +
        amplitude * Math.sin(2 * Math.PI * (index / 12 + phase)) +
        Math.sin(index * (seed % 13 + 1)) * 0.5,
    }));
  }
}
