import type { Language } from "./findings";

export type ToolEntry = {
  es: string;
  en: string;
};

/**
 * A data source; `id` doubles as its position in the reference ordering.
 */
export type SourceEntry = {
  key: string;
  id: number;
  display: string;
  db: string;
  es: string;
};

export const toolLabel = (tool: ToolEntry, language: Language): string =>
  language === "en" ? tool.en : tool.es;
