/**
 * Model Catalog Service
 *
 * Lists the models each provider offers. Listings are fetched through the
 * Fetch Gateway, cached per provider and replaced by a built-in fallback list
 * when the provider cannot be reached.
 */

import { ModelProvider } from '../types/sentiment';
import { CatalogModel, ModelCatalogSource } from '../types/sources';
import { FetchGateway } from './fetch-gateway';
import fallbackModels from '../data/fallback-models.json';

export interface ModelCatalogConfig {
  cacheTtlMs?: number;
  clock?: () => number;
}

interface CacheEntry {
  models: CatalogModel[];
  fetchedAt: number;
}

const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

/**
 * Built-in model list used when a provider listing is unavailable
 */
export function getFallbackModels(provider: ModelProvider): CatalogModel[] {
  return fallbackModels[provider].map(id => ({ id, name: id, enabled: true }));
}

export class ModelCatalog {
  private cache: Map<ModelProvider, CacheEntry> = new Map();
  private cacheTtlMs: number;
  private clock: () => number;

  constructor(
    private source: ModelCatalogSource,
    private gateway: FetchGateway,
    config: ModelCatalogConfig = {}
  ) {
    this.cacheTtlMs = config.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.clock = config.clock ?? Date.now;
  }

  /**
   * List the models of a provider
   *
   * Serves from cache while fresh; on a failed refresh the stale cache or the
   * fallback list is returned.
   */
  async listModels(provider: ModelProvider, signal?: AbortSignal): Promise<CatalogModel[]> {
    const cached = this.cache.get(provider);
    if (cached && this.clock() - cached.fetchedAt < this.cacheTtlMs) {
      return cached.models;
    }

    const result = await this.gateway.execute(
      `catalog:${provider}`,
      'listModels',
      (callSignal) => this.source.listModels(provider, callSignal),
      { signal }
    );

    if (result.status === 'OK') {
      this.cache.set(provider, { models: result.value, fetchedAt: this.clock() });
      return result.value;
    }

    console.warn('Model catalog unavailable, using fallback list:', {
      provider,
      status: result.status,
      stale: cached !== undefined
    });
    return cached ? cached.models : getFallbackModels(provider);
  }

  async isKnownModel(provider: ModelProvider, modelId: string, signal?: AbortSignal): Promise<boolean> {
    const models = await this.listModels(provider, signal);
    return models.some(model => model.id === modelId);
  }

  clearCache(): void {
    this.cache.clear();
  }
}
