import { z } from "zod";
import type { SourceEntry, ToolEntry } from "../../core/entities/catalog";
import type { CatalogPort } from "../../core/ports/inboundPorts";
import catalogJson from "../../data/catalog.json";

const catalogSchema = z.object({
  tools: z.array(z.object({ es: z.string().min(1), en: z.string().min(1) })),
  sources: z.array(
    z.object({
      key: z.string().min(1),
      id: z.number().int().positive(),
      display: z.string().min(1),
      db: z.string().min(1),
      es: z.string().min(1),
    }),
  ),
});

export type CatalogData = z.infer<typeof catalogSchema>;

const fold = (value: string): string =>
  value.trim().toLowerCase().replace(/[\s_-]+/g, " ");

/**
 * Serves the tool/source registry with lookups that accept any known alias.
 */
export class StaticCatalog implements CatalogPort {
  private readonly toolsByAlias = new Map<string, ToolEntry>();
  private readonly sourcesByAlias = new Map<string, SourceEntry>();
  private readonly tools: ToolEntry[];
  private readonly sources: SourceEntry[];

  constructor(data: CatalogData) {
    this.tools = data.tools;
    this.sources = [...data.sources].sort((a, b) => a.id - b.id);

    this.tools.forEach((tool) => {
      this.toolsByAlias.set(fold(tool.es), tool);
      this.toolsByAlias.set(fold(tool.en), tool);
    });

    this.sources.forEach((source) => {
      [source.key, source.display, source.db, source.es, String(source.id)]
        .map(fold)
        .forEach((alias) => this.sourcesByAlias.set(alias, source));
    });
  }

  resolveTool(name: string): ToolEntry | null {
    return this.toolsByAlias.get(fold(name)) ?? null;
  }

  resolveSource(name: string): SourceEntry | null {
    return this.sourcesByAlias.get(fold(name)) ?? null;
  }

  listTools(): ToolEntry[] {
    return [...this.tools];
  }

  /**
   * Sources in reference order.
   */
  listSources(): SourceEntry[] {
    return [...this.sources];
  }
}

export const loadCatalog = (): StaticCatalog =>
  new StaticCatalog(catalogSchema.parse(catalogJson));
