/**
 * Direct search providers and their registry
 */

import type { EngineId, SearchQuery, SearchResponse } from "../types";

export interface ProviderMetadata {
  id: EngineId;
  displayName: string;
  docsUrl?: string;
}

/**
 * An engine this process queries itself rather than through the aggregator
 */
export interface SearchProvider {
  readonly id: EngineId;
  search(query: SearchQuery): Promise<SearchResponse>;
  getMetadata(): ProviderMetadata;
}

export class ProviderRegistry {
  private providers = new Map<EngineId, SearchProvider>();

  register(provider: SearchProvider): void {
    if (this.providers.has(provider.id)) {
      throw new Error(`Provider already registered: ${provider.id}`);
    }
    this.providers.set(provider.id, provider);
  }

  get(id: EngineId): SearchProvider | undefined {
    return this.providers.get(id);
  }

  has(id: EngineId): boolean {
    return this.providers.has(id);
  }

  list(): SearchProvider[] {
    return [...this.providers.values()];
  }
}
