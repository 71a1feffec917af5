import { Inject, Injectable, Logger } from '@nestjs/common';
import { RagError, RetrievalError } from '../common/errors';
import { withRetry, withTimeout } from '../common/retry';
import { keywordTerms } from '../common/text';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { SourceType, StructuralTag } from '../documents/document.types';
import { EmbedderService } from '../ingest/embedder.service';
import { mergeWithRRF } from './rrf-merger';
import {
  compareHits,
  SEARCH_BACKEND,
  type IndexRecord,
  type QueryResult,
  type SearchBackend,
  type SearchFilters,
} from './search-backend';

export type RetrievedChunk = {
  chunkId: string;
  recordId: string;
  documentId: string;
  version: number;
  sequenceIndex: number;
  title: string;
  text: string;
  sourceType: SourceType;
  structuralTag: StructuralTag;
  score: number;
  lexicalRank?: number;
  vectorRank?: number;
};

// each side is asked for more than k so fusion has something to work with
const CANDIDATE_MULTIPLIER = 4;

@Injectable()
export class RetrieverService {
  private readonly logger = new Logger(RetrieverService.name);

  constructor(
    @Inject(SEARCH_BACKEND) private readonly backend: SearchBackend,
    private readonly embedder: EmbedderService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Hybrid search: lexical and vector candidates fused with weighted RRF.
   * At most `k` results, best first; an empty array when nothing is relevant.
   */
  async search(
    queryText: string,
    k = this.config.retrieval.topK,
    filters: SearchFilters = {},
    signal?: AbortSignal,
  ): Promise<RetrievedChunk[]> {
    if (!queryText.trim() || k <= 0) return [];

    const terms = keywordTerms(queryText);
    const vector = await this.embedder.embed(queryText, signal);
    const candidates = Math.max(k * CANDIDATE_MULTIPLIER, 20);

    const result = await this.query(terms, vector, filters, candidates, signal);

    const lexical = result.lexical.filter((h) => h.score > 0).map((h) => h.record);
    const semantic = result.vector
      .filter((h) => h.score >= this.config.retrieval.minVectorScore)
      .map((h) => h.record);

    const ranked = mergeWithRRF<IndexRecord>({ textHits: lexical, vectorHits: semantic })
      .map(({ hit, score, textRank, vectorRank }) => ({
        chunkId: hit.chunkId,
        recordId: hit.id,
        documentId: hit.documentId,
        version: hit.version,
        sequenceIndex: hit.sequenceIndex,
        title: hit.title,
        text: hit.text,
        sourceType: hit.sourceType,
        structuralTag: hit.structuralTag,
        score,
        lexicalRank: textRank,
        vectorRank,
      }))
      .sort(compareHits)
      .slice(0, k);

    this.logger.log(
      `search terms=${terms.length} lexical=${lexical.length} vector=${semantic.length} returned=${ranked.length}`,
    );
    return ranked;
  }

  private query(
    terms: string[],
    vector: number[],
    filters: SearchFilters,
    k: number,
    signal?: AbortSignal,
  ): Promise<QueryResult> {
    const { timeoutMs, retry } = this.config.backend;
    return withRetry(
      () =>
        withTimeout(
          () => this.backend.query(terms, vector, filters, k),
          timeoutMs,
          'search query',
          signal,
        ).catch((err: unknown) => {
          if (err instanceof RagError) throw err;
          throw new RetrievalError(
            `Search backend unavailable: ${err instanceof Error ? err.message : String(err)}`,
            err,
          );
        }),
      {
        ...retry,
        signal,
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn(`search attempt ${attempt} failed, retrying in ${delayMs}ms: ${String(err)}`),
      },
    );
  }
}
