/**
 * Web Search Adapter Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { buildSearchQuery, createWebSearchAdapter, parseSearchResult } from '../web-search.adapter.js';
import { SourceUnavailableError, type WebSearchClient, type WebSearchResult } from '../types.js';
import { folderCandidate, makeRequest } from './helpers.js';

const byAuthor: WebSearchResult = { title: 'Ghost of the Shadowfort by Ann Writer | Audiobook Store', snippet: '' };
const withSeries: WebSearchResult = {
  title: 'Ghost of the Shadowfort (The Bladeborn Saga, Book 2) by Ann Writer',
  snippet: '',
};
const snippetOnly: WebSearchResult = {
  title: 'Listen to fantasy audiobooks',
  snippet: 'The second adventure (Bladeborn Saga #2) continues the tale.',
};

describe('Web Search Adapter', () => {
  describe('parseSearchResult', () => {
    it('should read "Title by Author"', () => {
      expect(parseSearchResult(byAuthor)).toEqual({ title: 'Ghost of the Shadowfort', author: 'Ann Writer' });
    });

    it('should read a series designation next to the title', () => {
      expect(parseSearchResult(withSeries)).toEqual({
        title: 'Ghost of the Shadowfort',
        author: 'Ann Writer',
        series: 'The Bladeborn Saga',
        seriesIndex: 2,
      });
    });

    it('should fall back to a designation in the snippet', () => {
      expect(parseSearchResult(snippetOnly)).toEqual({ series: 'Bladeborn Saga', seriesIndex: 2 });
    });

    it('should return nothing for unrelated text', () => {
      expect(parseSearchResult({ title: 'Weather today', snippet: 'Sunny (mostly)' })).toEqual({});
    });
  });

  describe('buildSearchQuery', () => {
    it('should join title and folder hints', () => {
      expect(buildSearchQuery(makeRequest())).toBe('Ghost of the Shadowfort The Bladeborn Saga audiobook');
    });

    it('should return null without any hint', () => {
      expect(buildSearchQuery(makeRequest(folderCandidate('')))).toBeNull();
    });
  });

  describe('propose', () => {
    it('should vote values across results', async () => {
      const client: WebSearchClient = { search: vi.fn(async () => [byAuthor, withSeries, snippetOnly]) };
      const adapter = createWebSearchAdapter(client);

      const proposals = await adapter.propose(makeRequest());

      expect(client.search).toHaveBeenCalledWith('Ghost of the Shadowfort The Bladeborn Saga audiobook');
      expect(proposals).toEqual([
        { field: 'title', value: 'Ghost of the Shadowfort', confidence: 0.5 },
        { field: 'author', value: 'Ann Writer', confidence: 0.5 },
        { field: 'series', value: 'The Bladeborn Saga', confidence: 0.4 },
        { field: 'seriesIndex', value: 2, confidence: 0.5 },
      ]);
    });

    it('should keep only missing fields', async () => {
      const client: WebSearchClient = { search: async () => [byAuthor] };
      const adapter = createWebSearchAdapter(client);

      const proposals = await adapter.propose(makeRequest(undefined, { title: 'Ghost of the Shadowfort' }, ['author']));

      expect(proposals).toEqual([{ field: 'author', value: 'Ann Writer', confidence: 0.6 }]);
    });

    it('should propose nothing for empty results', async () => {
      const adapter = createWebSearchAdapter({ search: async () => [] });

      expect(await adapter.propose(makeRequest())).toEqual([]);
    });

    it('should report search failures as an unavailable source', async () => {
      const adapter = createWebSearchAdapter({
        search: async () => {
          throw new Error('quota exceeded');
        },
      });

      await expect(adapter.propose(makeRequest())).rejects.toThrow(SourceUnavailableError);
    });
  });
});
