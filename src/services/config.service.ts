/**
 * Configuration Service
 *
 * Manages application configuration stored in ~/.tomekeeper/config.json
 * Handles API keys, resolver tuning and grouping settings.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { getConfigPath, ensureAppDirectories } from './app-paths.service.js';
import { logError } from './logger.service.js';
import type { AdapterSource } from '../types/book.types.js';

// =============================================================================
// Type Definitions
// =============================================================================

export interface ApiKeys {
  anthropic?: string;
}

export interface LLMSettings {
  /** Claude model used for field inference */
  model: string;
  /** Whether the language-model adapter is consulted at all */
  enabled: boolean;
  /** Fixed confidence assigned to model guesses */
  confidence: number;
}

export interface ResolverSettings {
  /** Fields at or above this confidence are not re-resolved (0-1) */
  confidenceThreshold: number;
  /** Adapter order for the cascade (first = highest priority) */
  sourcePriority: AdapterSource[];
  /** Which adapters are enabled */
  enabledSources: AdapterSource[];
  /** Timeout for a single adapter call */
  adapterTimeoutMs: number;
  /** Entities resolved concurrently in a batch */
  concurrency: number;
  /** Rate limit aggressiveness (1-10, higher = more aggressive) */
  rateLimitLevel: number;
  /** Result pages fetched per catalog query */
  catalogMaxPages: number;
  /** Minimum similarity for a catalog record to count as a match (0-1) */
  catalogMinMatchScore: number;
  /** Upper bound for web search confidence */
  webSearchMaxConfidence: number;
  llm: LLMSettings;
}

export interface GroupingConfidences {
  singleFile: number;
  chaptered: number;
  /** Chapters named by number alone ("01.mp3") */
  numericChaptered: number;
  /** Directory holding one audio file */
  singleFileDirectory: number;
  multiBook: number;
  /** Files share one work key but do not form a clean chapter sequence */
  fallbackChaptered: number;
  /** Author/Series hints taken from folder names */
  folderHint: number;
}

export interface GroupingSettings {
  audioExtensions: string[];
  imageExtensions: string[];
  /** Longest alphabetic token still treated as a chapter ordinal */
  maxOrdinalTokenLength: number;
  /** Files read concurrently during metadata extraction */
  extractionConcurrency: number;
  confidence: GroupingConfidences;
}

export interface StoreSettings {
  /** Override for the persisted entity document path */
  documentPath?: string;
}

export interface AppConfig {
  version: string;
  apiKeys: ApiKeys;
  resolver: ResolverSettings;
  grouping: GroupingSettings;
  store: StoreSettings;
}

// =============================================================================
// Default Configuration
// =============================================================================

const DEFAULT_CONFIG: AppConfig = {
  version: '1.0.0',
  apiKeys: {},
  resolver: {
    confidenceThreshold: 0.7,
    sourcePriority: ['catalog_api', 'language_model', 'web_search', 'heuristic'],
    enabledSources: ['catalog_api', 'language_model', 'web_search', 'heuristic'],
    adapterTimeoutMs: 15000,
    concurrency: 3,
    rateLimitLevel: 5,
    catalogMaxPages: 2,
    catalogMinMatchScore: 0.6,
    webSearchMaxConfidence: 0.6,
    llm: {
      model: 'claude-3-5-haiku-20241022',
      enabled: true,
      confidence: 0.5,
    },
  },
  grouping: {
    audioExtensions: ['.m4b', '.mp3', '.m4a', '.aac', '.flac', '.ogg', '.opus', '.wma', '.wav'],
    imageExtensions: ['.jpg', '.jpeg', '.png', '.webp'],
    maxOrdinalTokenLength: 2,
    extractionConcurrency: 4,
    confidence: {
      singleFile: 1.0,
      chaptered: 0.9,
      numericChaptered: 0.7,
      singleFileDirectory: 0.8,
      multiBook: 0.75,
      fallbackChaptered: 0.5,
      folderHint: 0.3,
    },
  },
  store: {},
};

// =============================================================================
// Configuration State
// =============================================================================

let cachedConfig: AppConfig | null = null;

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Load configuration from disk
 * Returns cached config if available
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    cachedConfig = getDefaultConfig();
    saveConfig(cachedConfig);
    return cachedConfig;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: Partial<AppConfig> = JSON.parse(content);

    // Merge with defaults to ensure all fields exist
    cachedConfig = mergeWithDefaults(parsed);

    return cachedConfig;
  } catch (error) {
    logError('config', error, { action: 'load-config' });
    cachedConfig = getDefaultConfig();
    return cachedConfig;
  }
}

/**
 * Save configuration to disk
 */
function saveConfig(config: AppConfig): void {
  ensureAppDirectories();
  const configPath = getConfigPath();

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
    cachedConfig = config;
  } catch (error) {
    logError('config', error, { action: 'save-config' });
    throw new Error(`Failed to save configuration: ${error}`);
  }
}

// =============================================================================
// API Key Management
// =============================================================================

/**
 * Environment variable names for each API key.
 * These take priority over the config file.
 */
export const ENV_VAR_MAP: Record<keyof ApiKeys, string> = {
  anthropic: 'TOMEKEEPER_ANTHROPIC_API_KEY',
};

/**
 * Get an API key by name with priority lookup.
 *
 * Priority order:
 * 1. Environment variable (TOMEKEEPER_*)
 * 2. Config file (~/.tomekeeper/config.json)
 */
export function getApiKey(name: keyof ApiKeys): string | undefined {
  const envVar = ENV_VAR_MAP[name];
  const envValue = process.env[envVar];
  if (envValue && envValue.trim().length > 0) {
    return envValue.trim();
  }

  const config = loadConfig();
  return config.apiKeys[name];
}

/**
 * Check if an API key is configured (from any source)
 */
export function hasApiKey(name: keyof ApiKeys): boolean {
  const key = getApiKey(name);
  return key !== undefined && key.length > 0;
}

// =============================================================================
// Settings Accessors
// =============================================================================

export function getResolverSettings(): ResolverSettings {
  return loadConfig().resolver;
}

export function getGroupingSettings(): GroupingSettings {
  return loadConfig().grouping;
}

export function getLLMSettings(): LLMSettings {
  return loadConfig().resolver.llm;
}

export function getStoreSettings(): StoreSettings {
  return loadConfig().store;
}

/**
 * Default settings, for callers that must not touch the config file
 */
export function getDefaultConfig(): AppConfig {
  return mergeWithDefaults({});
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Merge partial config with defaults
 */
function mergeWithDefaults(partial: Partial<AppConfig>): AppConfig {
  const mergedResolver: ResolverSettings = {
    ...DEFAULT_CONFIG.resolver,
    ...partial.resolver,
    llm: {
      ...DEFAULT_CONFIG.resolver.llm,
      ...(partial.resolver?.llm || {}),
    },
    // Ensure arrays have defaults if not provided
    sourcePriority: [...(partial.resolver?.sourcePriority || DEFAULT_CONFIG.resolver.sourcePriority)],
    enabledSources: [...(partial.resolver?.enabledSources || DEFAULT_CONFIG.resolver.enabledSources)],
  };

  const mergedGrouping: GroupingSettings = {
    ...DEFAULT_CONFIG.grouping,
    ...partial.grouping,
    audioExtensions: [...(partial.grouping?.audioExtensions || DEFAULT_CONFIG.grouping.audioExtensions)],
    imageExtensions: [...(partial.grouping?.imageExtensions || DEFAULT_CONFIG.grouping.imageExtensions)],
    confidence: {
      ...DEFAULT_CONFIG.grouping.confidence,
      ...(partial.grouping?.confidence || {}),
    },
  };

  return {
    version: partial.version ?? DEFAULT_CONFIG.version,
    apiKeys: { ...DEFAULT_CONFIG.apiKeys, ...partial.apiKeys },
    resolver: mergedResolver,
    grouping: mergedGrouping,
    store: { ...DEFAULT_CONFIG.store, ...partial.store },
  };
}

// =============================================================================
// Initialization
// =============================================================================

/**
 * Initialize configuration on startup
 * Creates default config if it doesn't exist
 */
export function initializeConfig(): AppConfig {
  ensureAppDirectories();
  return loadConfig();
}
