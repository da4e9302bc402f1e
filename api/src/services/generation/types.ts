export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadInputTokens?: number;
  cacheCreationInputTokens?: number;
}

export interface CompletionResult {
  text: string;
  usage: CompletionUsage;
}

/**
 * A text-generation service. `cacheHint` asks the provider to cache the
 * system prompt; providers without prompt caching ignore it.
 */
export interface GenerativeModel {
  complete(
    systemPrompt: string,
    messages: ChatMessage[],
    cacheHint: boolean,
    signal?: AbortSignal,
  ): Promise<CompletionResult>;
}
