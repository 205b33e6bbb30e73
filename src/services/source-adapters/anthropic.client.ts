/**
 * Anthropic Language Model Client
 *
 * LanguageModelClient backed by the Claude Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import { getApiKey, getLLMSettings } from '../config.service.js';
import type { LanguageModelClient, PromptMessage } from './types.js';

export interface AnthropicClientOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

export function createAnthropicClient(options: AnthropicClientOptions): LanguageModelClient {
  const client = new Anthropic({ apiKey: options.apiKey });
  const maxTokens = options.maxTokens ?? 512;

  return {
    async complete(prompt: PromptMessage): Promise<string> {
      const response = await client.messages.create({
        model: options.model,
        max_tokens: maxTokens,
        system: prompt.system,
        messages: [
          {
            role: 'user',
            content: prompt.user,
          },
        ],
      });

      // Extract text content from response
      const textContent = response.content.find((c) => c.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new Error('No text response from Claude');
      }
      return textContent.text;
    },
  };
}

/**
 * Client from configuration, or null when no API key is set
 */
export function createConfiguredAnthropicClient(): LanguageModelClient | null {
  const apiKey = getApiKey('anthropic');
  if (!apiKey) {
    return null;
  }
  return createAnthropicClient({ apiKey, model: getLLMSettings().model });
}
