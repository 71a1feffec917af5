import { Inject, Injectable, Logger } from '@nestjs/common';
import { IndexConsistencyError, RagError, RetrievalError } from '../common/errors';
import { KeyedMutex } from '../common/keyed-mutex';
import { withRetry, withTimeout } from '../common/retry';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { Chunk, SourceType } from '../documents/document.types';
import {
  recordId,
  SEARCH_BACKEND,
  type IndexRecord,
  type SearchBackend,
} from '../search/search-backend';

export type UpsertRequest = {
  documentId: string;
  version: number;
  title: string;
  sourceType: SourceType;
  records: readonly Chunk[];
};

export type RejectedRecord = {
  chunkId: string;
  sequenceIndex: number;
  reason: string;
};

export type UpsertResult = {
  status: 'committed' | 'stale' | 'rejected';
  documentId: string;
  version: number;
  committed: number;
  rejected: RejectedRecord[];
};

/**
 * Writes chunk records into the search backend.
 *
 * A new version is staged next to the active one, made visible with a single
 * `activate` call, checked, and only then are older versions removed. Commits for
 * the same document are serialized.
 */
@Injectable()
export class IndexWriterService {
  private readonly logger = new Logger(IndexWriterService.name);
  private readonly locks = new KeyedMutex();
  private readonly halted = new Map<string, string>();

  constructor(
    @Inject(SEARCH_BACKEND) private readonly backend: SearchBackend,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async upsert(req: UpsertRequest): Promise<UpsertResult> {
    const { documentId, version } = req;

    return this.locks.runExclusive(documentId, async (): Promise<UpsertResult> => {
      this.assertNotHalted(documentId);

      const rejected: RejectedRecord[] = [];
      const records: IndexRecord[] = [];
      for (const chunk of req.records) {
        const reason = this.vectorProblem(chunk.embedding);
        if (reason || !chunk.embedding) {
          rejected.push({
            chunkId: chunk.id,
            sequenceIndex: chunk.sequenceIndex,
            reason: reason ?? 'missing vector',
          });
          continue;
        }
        records.push({
          id: recordId(documentId, version, chunk.sequenceIndex),
          documentId,
          version,
          chunkId: chunk.id,
          sequenceIndex: chunk.sequenceIndex,
          text: chunk.text,
          title: req.title,
          sourceType: req.sourceType,
          structuralTag: chunk.structuralTag,
          vector: chunk.embedding,
        });
      }

      if (rejected.length) {
        this.logger.warn(
          `Rejected ${rejected.length} record(s) without a usable vector for ${documentId}@${version}`,
        );
      }
      if (!records.length) {
        return { status: 'rejected', documentId, version, committed: 0, rejected };
      }

      const active = await this.io('activeVersion', () => this.backend.activeVersion(documentId));
      if (active !== null && version < active) {
        this.logger.log(`Skipping stale version ${version} of ${documentId} (active ${active})`);
        return { status: 'stale', documentId, version, committed: 0, rejected };
      }

      await this.io('upsert', () => this.backend.upsert(records));
      await this.io('activate', () => this.backend.activate(documentId, version));
      await this.verify(documentId, version, records.length);
      await this.io('delete', () => this.backend.delete(documentId, { keepVersion: version }));

      this.logger.log(`Committed ${records.length} record(s) for ${documentId}@${version}`);
      return { status: 'committed', documentId, version, committed: records.length, rejected };
    });
  }

  async deleteDocument(documentId: string) {
    await this.locks.runExclusive(documentId, async () => {
      this.assertNotHalted(documentId);
      await this.io('delete', () => this.backend.delete(documentId));
      this.logger.log(`Deleted ${documentId} from the index`);
    });
  }

  /** The version searches currently see, or null when the document is not indexed. */
  activeVersion(documentId: string): Promise<number | null> {
    return this.io('activeVersion', () => this.backend.activeVersion(documentId));
  }

  isHalted(documentId: string) {
    return this.halted.has(documentId);
  }

  clearHalt(documentId: string) {
    if (this.halted.delete(documentId)) {
      this.logger.warn(`Writes to ${documentId} resumed`);
    }
  }

  private async verify(documentId: string, version: number, expected: number) {
    const visible = await this.io('visibleRecords', () => this.backend.visibleRecords(documentId));

    const foreign = visible.filter((r) => r.version !== version);
    const unusable = visible.filter((r) => this.vectorProblem(r.vector) !== null);

    let problem: string | null = null;
    if (foreign.length) {
      problem = `${foreign.length} record(s) of another version visible after swap`;
    } else if (unusable.length) {
      problem = `${unusable.length} visible record(s) without a usable vector`;
    } else if (visible.length !== expected) {
      problem = `expected ${expected} visible record(s), found ${visible.length}`;
    }

    if (problem) {
      this.halted.set(documentId, problem);
      this.logger.error(`Index inconsistent for ${documentId}@${version}: ${problem}`);
      throw new IndexConsistencyError(
        `Index inconsistent for ${documentId}@${version}: ${problem}`,
        documentId,
      );
    }
  }

  private assertNotHalted(documentId: string) {
    const reason = this.halted.get(documentId);
    if (reason) {
      throw new IndexConsistencyError(
        `Writes to ${documentId} are halted: ${reason}`,
        documentId,
      );
    }
  }

  private vectorProblem(vector: readonly number[] | null): string | null {
    if (!vector || !vector.length) return 'missing vector';
    if (vector.length !== this.config.embedding.dimension) {
      return `vector has ${vector.length} dimensions, expected ${this.config.embedding.dimension}`;
    }
    if (!vector.every((v) => Number.isFinite(v))) return 'vector contains non-finite values';
    return null;
  }

  private io<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const { timeoutMs, retry } = this.config.backend;
    return withRetry(
      () =>
        withTimeout(() => call(), timeoutMs, `index ${operation}`).catch((err: unknown) => {
          throw toRetrievalError(operation, err);
        }),
      {
        ...retry,
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn(`index ${operation} attempt ${attempt} failed, retrying in ${delayMs}ms: ${String(err)}`),
      },
    );
  }
}

function toRetrievalError(operation: string, err: unknown) {
  if (err instanceof RagError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new RetrievalError(`Search backend unavailable during ${operation}: ${reason}`, err);
}
