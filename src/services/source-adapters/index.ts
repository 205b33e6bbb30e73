/**
 * Source Adapters Module
 *
 * Exports adapter types, implementations and the registry, and assembles
 * the default adapter set from configuration.
 */

// Types
export * from './types.js';

// Adapters
export { createCatalogAdapter, buildQueryLadder, scoreRecord } from './catalog.adapter.js';
export { createLanguageModelAdapter, buildPrompt, parseModelReply, loadPromptTemplate } from './language-model.adapter.js';
export { createWebSearchAdapter, parseSearchResult, buildSearchQuery } from './web-search.adapter.js';
export { createHeuristicAdapter, guessFields } from './heuristic.adapter.js';
export { createAnthropicClient, createConfiguredAnthropicClient } from './anthropic.client.js';

// Registry
export { AdapterRegistry } from './registry.js';

import { getResolverSettings, type ResolverSettings } from '../config.service.js';
import { SourceRateLimiter } from '../rate-limit.service.js';
import { AdapterRegistry } from './registry.js';
import { createCatalogAdapter } from './catalog.adapter.js';
import { createLanguageModelAdapter } from './language-model.adapter.js';
import { createWebSearchAdapter } from './web-search.adapter.js';
import { createHeuristicAdapter } from './heuristic.adapter.js';
import { createConfiguredAnthropicClient } from './anthropic.client.js';
import type { CatalogClient, LanguageModelClient, WebSearchClient } from './types.js';

export interface AdapterClients {
  catalog?: CatalogClient;
  /** null disables the model; undefined falls back to the configured Anthropic client */
  languageModel?: LanguageModelClient | null;
  webSearch?: WebSearchClient;
}

/**
 * Build a registry holding every adapter that has a client.
 * The heuristic adapter needs none and is always present.
 */
export function createAdapterRegistry(
  clients: AdapterClients = {},
  settings: ResolverSettings = getResolverSettings()
): AdapterRegistry {
  const registry = new AdapterRegistry();

  if (clients.catalog) {
    registry.register(
      createCatalogAdapter(clients.catalog, {
        maxPages: settings.catalogMaxPages,
        minMatchScore: settings.catalogMinMatchScore,
        rateLimiter: SourceRateLimiter.fromLevel(settings.rateLimitLevel),
      })
    );
  }

  if (settings.llm.enabled) {
    const languageModel = clients.languageModel === undefined ? createConfiguredAnthropicClient() : clients.languageModel;
    registry.register(createLanguageModelAdapter(languageModel, { confidence: settings.llm.confidence }));
  }

  if (clients.webSearch) {
    registry.register(createWebSearchAdapter(clients.webSearch, { maxConfidence: settings.webSearchMaxConfidence }));
  }

  registry.register(createHeuristicAdapter());

  return registry;
}
