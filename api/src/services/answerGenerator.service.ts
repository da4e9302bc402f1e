/**
 * Answer Generator
 *
 * Builds a grounded prompt from the merged, authorized documents and asks
 * the generative model for an answer. Citations are the sanitized source
 * documents themselves, one per document, in merged order.
 *
 * An empty result set short-circuits to NO_AUTHORIZED_DOCUMENTS_MESSAGE
 * without a model call.
 */

import {
  ConfigurationError,
  UpstreamGenerationError,
  describeError,
} from '@/errors/gateway';
import { sanitizeMetadata } from '@/services/metadataSanitizer';
import { PromptCache, promptCacheKey } from '@/services/promptCache.service';
import type { CompletionResult, CompletionUsage, GenerativeModel } from '@/services/generation/types';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import { withTimeout } from '@/utils/timeout';
import type {
  CallerContext,
  MergedResultSet,
  MetadataValue,
  ScoredDocument,
  SourceKind,
} from '@/types/documents';

// ── Constants ──────────────────────────────────────────────────────────

export const NO_AUTHORIZED_DOCUMENTS_MESSAGE =
  'I could not find any relevant documents that you are authorized to access for this question.';

export const SOURCE_LABELS: Record<SourceKind, string> = {
  PRIMARY_STORE: 'Knowledge Base',
  SECONDARY_INDEX: 'Enterprise Search',
};

export const ANSWER_INSTRUCTIONS_TEMPLATE = `You are an enterprise knowledge assistant.
Answer the user's question using only the numbered context documents provided with it.
Cite the documents you rely on by their number, for example [1] or [2][3].
If the documents do not contain the answer, say so plainly instead of guessing.
Never reveal access-control details or speculate about documents you were not given.
The user's request is scoped to the access groups: {{scope}}.`;

// ── Types ──────────────────────────────────────────────────────────────

export interface InstructionArtifact {
  systemPrompt: string;
}

export interface Citation {
  index: number;
  id: string;
  title: string;
  source: string;
  location: { uri: string };
  content: string;
  score: number;
  metadata: Record<string, MetadataValue>;
}

export interface GeneratedAnswer {
  text: string;
  citations: Citation[];
  /** True when the instruction artifact came from the prompt cache */
  cached: boolean;
  usage?: CompletionUsage;
}

export interface AnswerGeneratorOptions {
  model: GenerativeModel | null;
  promptCache: PromptCache<InstructionArtifact>;
  timeoutMs: number;
  template?: string;
  log?: Logger;
}

// ── Prompt Assembly ────────────────────────────────────────────────────

export function renderInstructions(template: string, groups: readonly string[]): InstructionArtifact {
  const scope = [...new Set(groups.map((g) => g.trim()).filter(Boolean))].sort();
  return { systemPrompt: template.replace('{{scope}}', scope.length > 0 ? scope.join(', ') : 'none') };
}

export function formatContextBlock(documents: readonly ScoredDocument[]): string {
  return documents
    .map((document, i) => {
      const label = SOURCE_LABELS[document.sourceKind];
      const metadata = JSON.stringify(sanitizeMetadata(document.metadata));
      return [
        `[${i + 1}] ${label}: ${document.title || document.id}`,
        `Source: ${document.sourceURI || 'n/a'}`,
        `Metadata: ${metadata}`,
        'Content:',
        document.content,
      ].join('\n');
    })
    .join('\n\n');
}

export function buildUserMessage(query: string, documents: readonly ScoredDocument[]): string {
  return `Context documents:\n\n${formatContextBlock(documents)}\n\nQuestion: ${query}`;
}

export function toCitation(document: ScoredDocument, index: number): Citation {
  return {
    index: index + 1,
    id: document.id,
    title: document.title,
    source: SOURCE_LABELS[document.sourceKind],
    location: { uri: document.sourceURI },
    content: document.content,
    score: document.score,
    metadata: sanitizeMetadata(document.metadata),
  };
}

// ── Generator ──────────────────────────────────────────────────────────

export class AnswerGenerator {
  private readonly template: string;
  private readonly log: Logger;

  constructor(private readonly options: AnswerGeneratorOptions) {
    this.template = options.template ?? ANSWER_INSTRUCTIONS_TEMPLATE;
    this.log = options.log ?? rootLogger;
  }

  async generateAnswer(
    query: string,
    merged: MergedResultSet,
    caller: CallerContext,
    { useCaching }: { useCaching: boolean },
  ): Promise<GeneratedAnswer> {
    if (merged.documents.length === 0) {
      return { text: NO_AUTHORIZED_DOCUMENTS_MESSAGE, citations: [], cached: false };
    }

    const model = this.options.model;
    if (!model) {
      throw new ConfigurationError('No generative model is configured');
    }

    const { artifact, cached } = await this.instructionsFor(caller, useCaching);
    const message = buildUserMessage(query, merged.documents);

    let completion: CompletionResult;
    try {
      completion = await withTimeout('generation', this.options.timeoutMs, (signal) =>
        model.complete(artifact.systemPrompt, [{ role: 'user', content: message }], useCaching, signal),
      );
    } catch (error) {
      this.log.error('Generative model call failed', { error: describeError(error) });
      throw new UpstreamGenerationError(`Answer generation failed: ${describeError(error)}`, { cause: error });
    }

    this.log.debug('Answer generated', {
      documents: merged.documents.length,
      cached,
      inputTokens: completion.usage.inputTokens,
      outputTokens: completion.usage.outputTokens,
    });

    return {
      text: completion.text,
      citations: merged.documents.map(toCitation),
      cached,
      usage: completion.usage,
    };
  }

  private async instructionsFor(
    caller: CallerContext,
    useCaching: boolean,
  ): Promise<{ artifact: Readonly<InstructionArtifact>; cached: boolean }> {
    const build = async () => renderInstructions(this.template, caller.groups);
    if (!useCaching) {
      return { artifact: await build(), cached: false };
    }

    const key = promptCacheKey(this.template, caller.groups);
    const { payload, hit } = await this.options.promptCache.getOrBuild(key, build);
    return { artifact: payload, cached: hit };
  }
}
