/**
 * External collaborator contracts: headline feeds, model catalogs, model clients and market data
 */

import { RawHeadline } from './headline';
import { ModelProvider, ModelSelection } from './sentiment';
import { MarketContext } from './opportunity';

export interface HeadlineSource {
  fetchHeadlines(portfolioId: string, signal?: AbortSignal): Promise<RawHeadline[]>;
}

export interface CatalogModel {
  id: string;
  name: string;
  enabled: boolean;
}

export interface ModelCatalogSource {
  listModels(provider: ModelProvider, signal?: AbortSignal): Promise<CatalogModel[]>;
}

export interface ModelPrompt {
  ticker: string;
  headline: string;
  source: string;
  publishedAt: string;
}

/**
 * A single sentiment model. The raw output is a JSON string or object and is
 * validated before it becomes a vote.
 */
export interface SentimentModel {
  score(prompt: ModelPrompt, signal?: AbortSignal): Promise<unknown>;
}

export interface SentimentModelResolver {
  resolve(selection: ModelSelection): SentimentModel;
}

export interface MarketContextProvider {
  getMarketContext(ticker: string): Promise<MarketContext | null>;
}
