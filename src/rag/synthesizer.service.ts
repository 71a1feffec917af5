import { Inject, Injectable, Logger } from '@nestjs/common';
import { LLM_BACKEND, type LanguageModelBackend } from '../bedrock/llm-backend';
import { GenerationError } from '../common/errors';
import { withRetry, withTimeout } from '../common/retry';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { Citation, Turn } from '../conversation/conversation.types';
import type { RetrievedChunk } from '../search/retriever.service';
import { PromptBuilder, type PromptSource } from './prompt-builder';

export const NO_GROUNDING_MESSAGE =
  "I couldn't find anything in the knowledge base that answers this question.";

export type SynthesisResult = {
  answerText: string;
  citations: Citation[];
  grounded: boolean;
};

const MARKER_GROUP = /\[\s*(S\d+(?:\s*,\s*S\d+)*)\s*\]/gi;

@Injectable()
export class SynthesizerService {
  private readonly logger = new Logger(SynthesizerService.name);
  private readonly prompts: PromptBuilder;

  constructor(
    @Inject(LLM_BACKEND) private readonly backend: LanguageModelBackend,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {
    this.prompts = new PromptBuilder({ maxContextChars: config.synthesis.maxContextChars });
  }

  async answer(
    resolvedQuestion: string,
    retrievedChunks: readonly RetrievedChunk[],
    history: readonly Turn[],
    opts: { signal?: AbortSignal } = {},
  ): Promise<SynthesisResult> {
    const { signal } = opts;
    if (signal?.aborted) throw cancelled();

    if (!retrievedChunks.length) {
      return { answerText: NO_GROUNDING_MESSAGE, citations: [], grounded: false };
    }

    const prompt = await this.prompts.build(
      resolvedQuestion,
      retrievedChunks.map((chunk, i) => ({ chunk, rank: i + 1 })),
      history,
    );
    if (prompt.dropped.length) {
      this.logger.log(`Dropped ${prompt.dropped.length} source(s) over the context budget`);
    }
    if (!prompt.sources.length) {
      return { answerText: NO_GROUNDING_MESSAGE, citations: [], grounded: false };
    }

    const text = await this.complete(prompt.text, signal);
    const citations = extractCitations(text, prompt.sources);

    return { answerText: text, citations, grounded: citations.length > 0 };
  }

  private complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const { timeoutMs, retry } = this.config.backend;

    return withRetry(
      () =>
        withTimeout((s) => this.backend.complete(prompt, s), timeoutMs, 'completion', signal)
          .then((text) => text.trim())
          .catch((err: unknown) => {
            if (signal?.aborted) throw cancelled(err);
            if (err instanceof GenerationError) throw err;
            throw new GenerationError(
              `Language model unavailable: ${err instanceof Error ? err.message : String(err)}`,
              true,
              false,
              err,
            );
          }),
      {
        // generation is retried once
        maxAttempts: 2,
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
        signal,
        shouldRetry: (err) => err instanceof GenerationError && err.retryable && !err.cancelled,
        onRetry: (err) => this.logger.warn(`completion failed, retrying once: ${String(err)}`),
      },
    );
  }
}

/**
 * Sources referenced by `[S#]` markers, in order of first reference.
 * Markers that point at no source of this prompt are ignored.
 */
export function extractCitations(answerText: string, sources: readonly PromptSource[]): Citation[] {
  const byMarker = new Map(sources.map((s) => [s.marker, s.chunk]));
  const seen = new Set<string>();
  const citations: Citation[] = [];

  for (const m of answerText.matchAll(MARKER_GROUP)) {
    for (const raw of m[1].split(',')) {
      const marker = raw.trim().toUpperCase();
      const chunk = byMarker.get(marker);
      if (!chunk || seen.has(marker)) continue;
      seen.add(marker);
      citations.push({
        marker,
        chunkId: chunk.chunkId,
        documentId: chunk.documentId,
        title: chunk.title,
      });
    }
  }
  return citations;
}

function cancelled(cause?: unknown) {
  return new GenerationError('Generation cancelled by the caller', false, true, cause);
}
