/**
 * AnthropicGenerativeModel
 *
 * Messages API client over fetch. With a cache hint the system prompt is
 * sent as a text block marked `cache_control: ephemeral`.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/errors/gateway';
import type { ChatMessage, CompletionResult, GenerativeModel } from './types';

const ANTHROPIC_VERSION = '2023-06-01';

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const messagesResponseSchema = z.object({
  content: z.array(contentBlockSchema),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0),
      cache_read_input_tokens: z.number().nullish(),
      cache_creation_input_tokens: z.number().nullish(),
    })
    .default({}),
});

type SystemBlock = { type: 'text'; text: string; cache_control?: { type: 'ephemeral' } };

export function buildSystemParam(systemPrompt: string, cacheHint: boolean): string | SystemBlock[] {
  if (!cacheHint) return systemPrompt;
  return [{ type: 'text', text: systemPrompt, cache_control: { type: 'ephemeral' } }];
}

function contentToText(blocks: z.infer<typeof contentBlockSchema>[]): string {
  return blocks
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '')
    .join('\n')
    .trim();
}

export interface AnthropicModelOptions {
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  baseUrl?: string;
}

export class AnthropicGenerativeModel implements GenerativeModel {
  private readonly apiKey: string;
  private readonly endpoint: string;

  constructor(private readonly options: AnthropicModelOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY environment variable is not set');
    }
    this.apiKey = options.apiKey;
    this.endpoint = `${(options.baseUrl ?? 'https://api.anthropic.com').replace(/\/+$/, '')}/v1/messages`;
  }

  async complete(
    systemPrompt: string,
    messages: ChatMessage[],
    cacheHint: boolean,
    signal?: AbortSignal,
  ): Promise<CompletionResult> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        system: buildSystemParam(systemPrompt, cacheHint),
        messages,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Anthropic API error (${response.status}): ${await response.text()}`);
    }

    const body = messagesResponseSchema.parse(await response.json());
    return {
      text: contentToText(body.content),
      usage: {
        inputTokens: body.usage.input_tokens,
        outputTokens: body.usage.output_tokens,
        cacheReadInputTokens: body.usage.cache_read_input_tokens ?? undefined,
        cacheCreationInputTokens: body.usage.cache_creation_input_tokens ?? undefined,
      },
    };
  }
}
