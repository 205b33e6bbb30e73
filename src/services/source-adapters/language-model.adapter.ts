/**
 * Language Model Source Adapter
 *
 * Asks a language model to infer book fields from file and folder names.
 * Prompts come from data/prompts.yaml; replies are validated before use.
 * Without a client the adapter proposes nothing.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { adapterLogger } from '../logger.service.js';
import type { CanonicalField, FieldProposal } from '../../types/book.types.js';
import {
  onlyMissing,
  SourceUnavailableError,
  type AdapterRequest,
  type LanguageModelClient,
  type PromptMessage,
  type SourceAdapter,
} from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const logger = adapterLogger.child({ adapter: 'language_model' });

// =============================================================================
// Prompt Templates
// =============================================================================

const PromptTemplateSchema = z.object({
  system: z.string().min(1),
  user: z.string().min(1),
});

const PromptFileSchema = z.object({
  book_fields: PromptTemplateSchema,
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;

let cachedTemplate: PromptTemplate | null = null;

/**
 * Load the field inference prompt from YAML
 */
export function loadPromptTemplate(): PromptTemplate {
  if (cachedTemplate) {
    return cachedTemplate;
  }

  const promptsPath = join(__dirname, '../../data/prompts.yaml');
  const content = readFileSync(promptsPath, 'utf-8');
  cachedTemplate = PromptFileSchema.parse(yaml.load(content)).book_fields;
  return cachedTemplate;
}

const FIELD_LABELS: Record<CanonicalField, string> = {
  author: 'author',
  series: 'series',
  seriesIndex: 'series_index',
  title: 'title',
};

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Build the prompt for one request
 */
export function buildPrompt(request: AdapterRequest, template: PromptTemplate = loadPromptTemplate()): PromptMessage {
  const known = Object.entries(request.known)
    .map(([field, value]) => `- ${field}: ${value}`)
    .join('\n');

  const values: Record<string, string> = {
    folder_name: request.hints.folderName,
    work_name: request.hints.workName ?? '(none)',
    file_names: request.hints.fileNames.map((name) => `- ${name}`).join('\n'),
    known_fields: known.length > 0 ? known : '(nothing)',
    missing_fields: request.missing.map((f) => FIELD_LABELS[f]).join(', '),
  };

  return {
    system: template.system.trim(),
    user: fillTemplate(template.user, values).trim(),
  };
}

// =============================================================================
// Reply Parsing
// =============================================================================

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : null));

const ReplySchema = z.object({
  title: optionalText,
  author: optionalText,
  series: optionalText,
  series_index: z
    .union([z.number(), z.string()])
    .nullish()
    .transform((v) => {
      if (v === null || v === undefined) return null;
      const n = typeof v === 'number' ? v : parseInt(v, 10);
      return Number.isInteger(n) && n > 0 ? n : null;
    }),
});

export type ModelReply = z.infer<typeof ReplySchema>;

/**
 * Extract and validate the JSON object in a model reply.
 * Returns null when the reply holds no valid object.
 */
export function parseModelReply(text: string): ModelReply | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  const result = ReplySchema.safeParse(raw);
  return result.success ? result.data : null;
}

// =============================================================================
// Adapter
// =============================================================================

export interface LanguageModelAdapterOptions {
  /** Fixed confidence for model guesses (default: 0.5) */
  confidence?: number;
  template?: PromptTemplate;
}

export function createLanguageModelAdapter(
  client: LanguageModelClient | null,
  options: LanguageModelAdapterOptions = {}
): SourceAdapter {
  const confidence = options.confidence ?? 0.5;

  return {
    name: 'language_model',
    displayName: 'Language Model',

    async propose(request: AdapterRequest): Promise<FieldProposal[]> {
      if (!client) {
        return [];
      }

      const prompt = buildPrompt(request, options.template);

      let text: string;
      try {
        text = await client.complete(prompt);
      } catch (error) {
        throw new SourceUnavailableError('language_model', error instanceof Error ? error.message : String(error));
      }

      const reply = parseModelReply(text);
      if (!reply) {
        logger.warn({ entityId: request.candidate.id, reply: text.slice(0, 200) }, 'Unusable model reply');
        return [];
      }

      const proposals: FieldProposal[] = [];
      if (reply.title) proposals.push({ field: 'title', value: reply.title, confidence });
      if (reply.author) proposals.push({ field: 'author', value: reply.author, confidence });
      if (reply.series) proposals.push({ field: 'series', value: reply.series, confidence });
      if (reply.series_index !== null) proposals.push({ field: 'seriesIndex', value: reply.series_index, confidence });

      return onlyMissing(request, proposals);
    },
  };
}

export default createLanguageModelAdapter;
