/**
 * Smart engine selection
 *
 * Scores a query against keyword categories and routes it to the winning
 * category's engines. A keyword scores when it is a substring of the
 * lowercased query; there is no word-boundary check, so "go" also matches
 * "google". The strictly highest score wins and ties go to the category listed
 * first in the catalog, so reordering the catalog changes tie outcomes.
 */

import { z } from "zod";
import type { EngineId, EngineSet } from "../types";
import rawCatalog from "./catalog.json";

const engineList = z.array(z.string().min(1)).min(1);

export const EngineCatalogSchema = z.object({
  defaultEngines: engineList,
  categories: z.array(
    z.object({
      name: z.string().min(1),
      engines: engineList,
      keywords: z.array(z.string().min(1)).min(1),
    }),
  ),
  /** Engine → aggregator category, e.g. "github" → "it" */
  engineCategories: z.record(z.string()),
});

export type EngineCatalog = z.infer<typeof EngineCatalogSchema>;
export type KeywordCategory = EngineCatalog["categories"][number];

export interface CategoryScore {
  name: string;
  score: number;
  matched: string[];
}

/**
 * Remove duplicate engine names, keeping first occurrence order
 */
export function dedupeEngines(engines: readonly EngineId[]): EngineId[] {
  return [...new Set(engines.map((engine) => engine.trim()).filter(Boolean))];
}

let defaultCatalog: EngineCatalog | undefined;

/**
 * The bundled multilingual catalog, validated once
 */
export function loadDefaultCatalog(): EngineCatalog {
  defaultCatalog ??= EngineCatalogSchema.parse(rawCatalog);
  return defaultCatalog;
}

export class EngineSelector {
  private readonly categories: KeywordCategory[];
  private readonly defaultEngines: EngineId[];
  private readonly engineCategories: Record<string, string>;

  constructor(catalog: EngineCatalog = loadDefaultCatalog()) {
    this.categories = catalog.categories.map((category) => ({
      ...category,
      engines: dedupeEngines(category.engines),
      keywords: category.keywords.map((keyword) => keyword.toLowerCase()),
    }));
    this.defaultEngines = dedupeEngines(catalog.defaultEngines);
    this.engineCategories = catalog.engineCategories;
  }

  /**
   * Score every category against the query, in catalog order
   */
  scoreQuery(query: string): CategoryScore[] {
    const q = query.toLowerCase();
    return this.categories.map((category) => {
      const matched = q.trim() ? category.keywords.filter((keyword) => q.includes(keyword)) : [];
      return { name: category.name, score: matched.length, matched };
    });
  }

  /**
   * Name of the winning category, or undefined when nothing scores
   */
  selectCategory(query: string): string | undefined {
    let best: CategoryScore | undefined;
    for (const candidate of this.scoreQuery(query)) {
      if (candidate.score > (best?.score ?? 0)) {
        best = candidate;
      }
    }
    return best?.name;
  }

  /**
   * Engines for the query: the winning category's set, else the default set
   */
  selectEngines(query: string): EngineSet {
    const winner = this.selectCategory(query);
    const category = this.categories.find((c) => c.name === winner);
    return {
      engines: [...(category?.engines ?? this.defaultEngines)],
      source: "smart",
    };
  }

  getDefaultEngines(): EngineId[] {
    return [...this.defaultEngines];
  }

  /**
   * Aggregator categories the engines need to return anything, sorted.
   * Engines without a known category contribute nothing; an empty result
   * falls back to "general".
   */
  categoriesForEngines(engines: readonly EngineId[]): string[] {
    const categories = new Set<string>();
    for (const engine of engines) {
      const category = this.engineCategories[engine.trim()];
      if (category) {
        categories.add(category);
      }
    }
    return categories.size > 0 ? [...categories].sort() : ["general"];
  }
}
