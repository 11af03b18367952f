/**
 * Extraction Adapter
 *
 * Turns one complaint into structured pain point fields using Claude.
 * The extractor only depends on the ExtractionAdapter contract.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ExtractionConfig } from '../config';
import { AdapterUnavailable, ParseError } from '../errors';
import { PAIN_POINT_CATEGORIES, SEVERITIES } from '../types';
import { parsePainPointReply } from './pain-point-schema';
import type { ExtractionOutcome } from './pain-point-schema';

export interface ExtractionAdapter {
  name: string;
  /** Rejects with AdapterUnavailable when the provider refuses the credentials */
  extract(text: string, signal?: AbortSignal): Promise<ExtractionOutcome>;
}

export function buildExtractionPrompt(text: string): string {
  return `Analyze this customer complaint and extract the pain point in structured format.

COMPLAINT:
${text}

Extract the following:
1. problem_statement: One clear sentence describing the core problem
2. category: One of [${PAIN_POINT_CATEGORIES.join(', ')}]
3. severity: One of [${SEVERITIES.join(', ')}]
4. context: Additional context about when/why this is a problem
5. suggested_solution: What would solve this problem
6. tags: 2-5 relevant keywords
7. target_audience: Who experiences this (e.g., "small business owners", "developers")
8. related_industry: What industry/niche (e.g., "SaaS", "e-commerce")

Respond ONLY with valid JSON matching this structure:
{
  "problem_statement": "...",
  "category": "...",
  "severity": "...",
  "context": "...",
  "suggested_solution": "...",
  "tags": ["...", "..."],
  "target_audience": "...",
  "related_industry": "..."
}`;
}

/**
 * Rejected credentials end the run; anything else stays a per-item failure.
 */
export function toAdapterError(error: unknown): unknown {
  if (error instanceof Anthropic.APIError && (error.status === 401 || error.status === 403)) {
    return new AdapterUnavailable(`Anthropic rejected the API key: ${error.message}`, { cause: error });
  }
  return error;
}

export class AnthropicExtractionAdapter implements ExtractionAdapter {
  readonly name = 'anthropic';
  private anthropic: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(extraction: ExtractionConfig) {
    if (!extraction.anthropicApiKey) {
      throw new AdapterUnavailable('ANTHROPIC_API_KEY not configured');
    }
    this.anthropic = new Anthropic({
      apiKey: extraction.anthropicApiKey,
      timeout: extraction.timeoutMs,
      maxRetries: 1,
    });
    this.model = extraction.model;
    this.maxTokens = extraction.maxTokens;
  }

  async extract(text: string, signal?: AbortSignal): Promise<ExtractionOutcome> {
    let message: Anthropic.Message;
    try {
      message = await this.anthropic.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [
            {
              role: 'user',
              content: buildExtractionPrompt(text),
            },
          ],
        },
        { signal }
      );
    } catch (error) {
      throw toAdapterError(error);
    }

    const content = message.content[0];
    if (!content || content.type !== 'text') {
      return { ok: false, error: new ParseError('Unexpected response type from Claude') };
    }

    return parsePainPointReply(content.text);
  }
}

/**
 * Factory function to create the extraction adapter.
 * Throws AdapterUnavailable when no credentials are configured.
 */
export function createExtractionAdapter(extraction: ExtractionConfig): ExtractionAdapter {
  return new AnthropicExtractionAdapter(extraction);
}
