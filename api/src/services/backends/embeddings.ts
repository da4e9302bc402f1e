/**
 * Query embeddings from the OpenAI embeddings endpoint.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/errors/gateway';

export type Embedder = (text: string, signal?: AbortSignal) => Promise<number[]>;

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export interface OpenAiEmbedderOptions {
  apiKey?: string;
  model: string;
  baseUrl?: string;
}

/**
 * @throws ConfigurationError when no API key is configured
 */
export function createOpenAiEmbedder(options: OpenAiEmbedderOptions): Embedder {
  const { apiKey, model } = options;
  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY environment variable is not set. Cannot generate embeddings.');
  }
  const endpoint = `${options.baseUrl ?? 'https://api.openai.com/v1'}/embeddings`;

  return async (text, signal) => {
    const response = await fetch(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({ input: text, model }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error (${response.status}): ${error}`);
    }

    const data = embeddingResponseSchema.parse(await response.json());
    return data.data[0].embedding;
  };
}
