import { Inject, Injectable, Logger } from '@nestjs/common';
import { LLM_BACKEND, type LanguageModelBackend } from '../bedrock/llm-backend';
import { EmbeddingError, RagError, TimeoutError } from '../common/errors';
import { withRetry, withTimeout } from '../common/retry';
import { APP_CONFIG, type AppConfig } from '../config/app.config';

export type EmbedResult =
  | { ok: true; vector: number[] }
  | { ok: false; error: EmbeddingError };

@Injectable()
export class EmbedderService {
  private readonly logger = new Logger(EmbedderService.name);

  constructor(
    @Inject(LLM_BACKEND) private readonly backend: LanguageModelBackend,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  get dimension() {
    return this.config.embedding.dimension;
  }

  get model() {
    return this.backend.embeddingModel;
  }

  /** Unit-length vector of the configured dimension, or an EmbeddingError. */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    this.validateInput(text);
    const { timeoutMs, retry } = this.config.backend;

    const raw = await withRetry(
      (attempt) =>
        withTimeout((s) => this.backend.embed(text, s), timeoutMs, 'embed', signal).catch(
          (err: unknown) => {
            throw toEmbeddingError(err, attempt);
          },
        ),
      {
        ...retry,
        signal,
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn(`embed attempt ${attempt} failed, retrying in ${delayMs}ms: ${String(err)}`),
      },
    );

    return this.normalize(raw);
  }

  /**
   * One result per input, same order. Failures are reported per item so callers
   * can retry only the failed subset.
   */
  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbedResult[]> {
    const { batchSize, concurrency } = this.config.embedding;
    const results: EmbedResult[] = new Array<EmbedResult>(texts.length);

    const batches: number[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      const idx: number[] = [];
      for (let j = i; j < Math.min(i + batchSize, texts.length); j++) idx.push(j);
      batches.push(idx);
    }

    let next = 0;
    const worker = async () => {
      while (next < batches.length) {
        const batch = batches[next++];
        await Promise.all(
          batch.map(async (i) => {
            results[i] = await this.embed(texts[i], signal).then(
              (vector): EmbedResult => ({ ok: true, vector }),
              (err: unknown): EmbedResult => ({ ok: false, error: toEmbeddingError(err, 1) }),
            );
          }),
        );
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(concurrency, batches.length) }, () => worker()),
    );

    const failed = results.filter((r) => !r.ok).length;
    if (failed) {
      this.logger.warn(`embedBatch: ${failed}/${texts.length} items failed`);
    }
    return results;
  }

  private validateInput(text: string) {
    if (!text.trim()) {
      throw new EmbeddingError('Cannot embed empty text', false);
    }
    if (text.length > this.config.embedding.maxChars) {
      throw new EmbeddingError(
        `Text of ${text.length} chars exceeds the embedding limit of ${this.config.embedding.maxChars}`,
        false,
      );
    }
  }

  private normalize(vector: readonly number[]): number[] {
    if (vector.length !== this.dimension) {
      throw new EmbeddingError(
        `Embedding has ${vector.length} dimensions, expected ${this.dimension}`,
        false,
      );
    }
    if (!vector.every((v) => Number.isFinite(v))) {
      throw new EmbeddingError('Embedding contains non-finite values', false);
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (norm === 0) {
      throw new EmbeddingError('Embedding is a zero vector', false);
    }
    return vector.map((v) => v / norm);
  }
}

function toEmbeddingError(err: unknown, attempt: number): EmbeddingError {
  if (err instanceof EmbeddingError) return err;
  if (err instanceof TimeoutError) {
    return new EmbeddingError(err.message, true, [], err);
  }
  if (err instanceof RagError) {
    return new EmbeddingError(err.message, err.retryable, [], err);
  }
  // anything else from the backend is treated as transient unavailability
  return new EmbeddingError(
    `Embedding backend unavailable (attempt ${attempt}): ${err instanceof Error ? err.message : String(err)}`,
    true,
    [],
    err,
  );
}
