/**
 * Config Service Tests
 *
 * Runs against a temporary app data directory. The module is re-imported
 * for each test so the in-memory config starts empty.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

type ConfigModule = typeof import('../config.service.js');

const ANTHROPIC_ENV = 'TOMEKEEPER_ANTHROPIC_API_KEY';

describe('Config Service', () => {
  let home: string;
  let config: ConfigModule;
  const originalHome = process.env.TOMEKEEPER_HOME;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'config-test-'));
    process.env.TOMEKEEPER_HOME = home;
    delete process.env[ANTHROPIC_ENV];
    vi.resetModules();
    config = await import('../config.service.js');
  });

  afterEach(async () => {
    process.env.TOMEKEEPER_HOME = originalHome;
    delete process.env[ANTHROPIC_ENV];
    await rm(home, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should write defaults when no config file exists', () => {
      const loaded = config.loadConfig();

      expect(loaded.resolver.confidenceThreshold).toBe(0.7);
      expect(loaded.resolver.sourcePriority).toEqual(['catalog_api', 'language_model', 'web_search', 'heuristic']);
      expect(loaded.grouping.maxOrdinalTokenLength).toBe(2);
      expect(existsSync(join(home, 'config.json'))).toBe(true);
    });

    it('should merge a partial file with defaults', async () => {
      await writeFile(join(home, 'config.json'), JSON.stringify({
        resolver: { confidenceThreshold: 0.8 },
        grouping: { confidence: { chaptered: 0.95 } },
      }));

      const loaded = config.loadConfig();

      expect(loaded.resolver.confidenceThreshold).toBe(0.8);
      expect(loaded.resolver.adapterTimeoutMs).toBe(15000);
      expect(loaded.resolver.llm.confidence).toBe(0.5);
      expect(loaded.grouping.confidence.chaptered).toBe(0.95);
      expect(loaded.grouping.confidence.multiBook).toBe(0.75);
    });

    it('should fall back to defaults for an unreadable file', async () => {
      await writeFile(join(home, 'config.json'), '{ not json');

      expect(config.loadConfig().resolver.concurrency).toBe(3);
    });

    it('should cache the loaded config', () => {
      expect(config.loadConfig()).toBe(config.loadConfig());
    });
  });

  describe('API keys', () => {
    beforeEach(async () => {
      await writeFile(join(home, 'config.json'), JSON.stringify({ apiKeys: { anthropic: 'config-key' } }));
    });

    it('should prefer the environment variable', () => {
      process.env[ANTHROPIC_ENV] = ' test-secret ';

      expect(config.getApiKey('anthropic')).toBe('test-secret');
    });

    it('should fall back to the config file', () => {
      expect(config.getApiKey('anthropic')).toBe('config-key');
      expect(config.hasApiKey('anthropic')).toBe(true);
    });

    it('should report a missing key', async () => {
      await writeFile(join(home, 'config.json'), JSON.stringify({ apiKeys: {} }));

      expect(config.hasApiKey('anthropic')).toBe(false);
    });
  });
});
