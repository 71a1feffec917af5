import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { EmbeddingError, ParseError } from '../common/errors';
import { KeyedMutex } from '../common/keyed-mutex';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { Chunker } from '../documents/chunker';
import { DocumentParser } from '../documents/document-parser.service';
import { DOCUMENT_STORE, type DocumentStore, type StoredDocument } from '../documents/document-store';
import { sourceTypeFor, type Chunk, type DocumentRecord } from '../documents/document.types';
import { EmbedderService } from './embedder.service';
import { IndexWriterService, type RejectedRecord, type UpsertResult } from './index-writer.service';

type UploadOpts = {
  documentId?: string;
  title: string;
  contentType: string;
  bytes: Buffer;
};

export type IngestResult = {
  documentId: string;
  version: number;
  status: UpsertResult['status'];
  chunks: number;
  rejected: RejectedRecord[];
};

/**
 * Ingestion path: document store -> parser -> chunker -> embedder -> index writer.
 * A version either lands in the index completely or not at all.
 */
@Injectable()
export class IngestService {
  private readonly logger = new Logger(IngestService.name);
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly registry = new KeyedMutex();
  private readonly chunker: Chunker;

  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    private readonly parser: DocumentParser,
    private readonly embedder: EmbedderService,
    private readonly writer: IndexWriterService,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.chunker = new Chunker(config.chunking);
  }

  /** Stores the bytes and ingests them. Uploading an existing id creates a new version. */
  async uploadDocument(opts: UploadOpts): Promise<IngestResult> {
    const documentId = opts.documentId ?? uuidv4();
    const sourceType = sourceTypeFor(opts.contentType);
    if (!sourceType) {
      throw new ParseError(`Unsupported content type: ${opts.contentType}`, documentId);
    }

    const doc = await this.registry.runExclusive(documentId, async () => {
      const record: DocumentRecord = {
        id: documentId,
        title: opts.title,
        sourceType,
        contentType: opts.contentType,
        version: await this.nextVersion(documentId),
        status: 'pending',
        chunkCount: 0,
        uploadedAt: new Date().toISOString(),
      };
      this.documents.set(documentId, record);
      return record;
    });

    const stored = { bytes: opts.bytes, contentType: opts.contentType };
    await this.store.put(documentId, stored);
    return this.ingest(doc, stored);
  }

  async ingestDocument(documentId: string): Promise<IngestResult> {
    const stored = await this.store.fetch(documentId);
    if (!stored) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    const doc = this.documents.get(documentId) ?? (await this.register(documentId, stored.contentType));
    return this.ingest(doc, stored);
  }

  private async ingest(doc: DocumentRecord, stored: StoredDocument): Promise<IngestResult> {
    const { id: documentId, version } = doc;
    this.logger.log(`Ingesting ${documentId}@${version} (${doc.contentType})`);

    try {
      const parsed = await this.parser.parse(documentId, stored.bytes, stored.contentType);
      const chunks = this.chunker.chunk(documentId, parsed.text, parsed.hints);
      const embedded = await this.embedChunks(documentId, chunks);

      const result = await this.writer.upsert({
        documentId,
        version,
        title: doc.title,
        sourceType: parsed.hints.sourceType,
        records: embedded,
      });

      if (result.status === 'committed') {
        this.update(documentId, version, {
          status: 'parsed',
          chunkCount: result.committed,
          parsedAt: new Date().toISOString(),
          error: undefined,
        });
      } else {
        const reason =
          result.status === 'stale'
            ? `version ${version} is older than the indexed one`
            : `all ${result.rejected.length} record(s) were rejected`;
        this.update(documentId, version, { status: 'failed', error: reason });
        this.logger.warn(`Ingestion of ${documentId}@${version} not committed: ${reason}`);
      }

      return {
        documentId,
        version,
        status: result.status,
        chunks: result.committed,
        rejected: result.rejected,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.update(documentId, version, { status: 'failed', error: message });
      this.logger.error(`Ingestion of ${documentId}@${version} failed: ${message}`);
      throw err;
    }
  }

  getDocument(documentId: string): DocumentRecord {
    const doc = this.documents.get(documentId);
    if (!doc) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }
    return doc;
  }

  async deleteDocument(documentId: string) {
    await this.writer.deleteDocument(documentId);
    await this.store.remove(documentId);
    this.documents.delete(documentId);
    return { ok: true, documentId };
  }

  clearHalt(documentId: string) {
    this.writer.clearHalt(documentId);
    return { ok: true, documentId, halted: this.writer.isHalted(documentId) };
  }

  /**
   * Embeds every chunk. Items that fail are retried once as a subset; anything
   * still failing fails the whole version.
   */
  private async embedChunks(documentId: string, chunks: Chunk[]): Promise<Chunk[]> {
    const vectors: Array<number[] | null> = chunks.map(() => null);
    let pending = chunks.map((_, i) => i);
    let errors: EmbeddingError[] = [];

    for (let pass = 1; pass <= 2 && pending.length; pass++) {
      const results = await this.embedder.embedBatch(pending.map((i) => chunks[i].text));
      const failed: number[] = [];
      errors = [];

      results.forEach((r, j) => {
        if (r.ok) {
          vectors[pending[j]] = r.vector;
        } else {
          failed.push(pending[j]);
          errors.push(r.error);
        }
      });

      pending = failed;
      if (errors.some((e) => !e.retryable)) break;
    }

    if (pending.length) {
      throw new EmbeddingError(
        `${pending.length} of ${chunks.length} chunks of ${documentId} could not be embedded: ${errors[0]?.message ?? 'unknown error'}`,
        errors.every((e) => e.retryable),
        pending,
        errors[0],
      );
    }

    return chunks.map((c, i) => ({ ...c, embedding: vectors[i] }));
  }

  private register(documentId: string, contentType: string): Promise<DocumentRecord> {
    const sourceType = sourceTypeFor(contentType);
    if (!sourceType) {
      throw new ParseError(`Unsupported content type: ${contentType}`, documentId);
    }
    return this.registry.runExclusive(documentId, async () => {
      const doc: DocumentRecord = {
        id: documentId,
        title: documentId,
        sourceType,
        contentType,
        version: await this.nextVersion(documentId),
        status: 'pending',
        chunkCount: 0,
        uploadedAt: new Date().toISOString(),
      };
      this.documents.set(documentId, doc);
      return doc;
    });
  }

  /**
   * One past the highest version seen here or active in the index, so a restarted
   * process never hands out a version the index would treat as stale.
   */
  private async nextVersion(documentId: string) {
    const known = this.documents.get(documentId)?.version ?? 0;
    const active = (await this.writer.activeVersion(documentId)) ?? 0;
    return Math.max(known, active) + 1;
  }

  /** Applies a status change unless a newer upload has replaced the record. */
  private update(documentId: string, version: number, patch: Partial<DocumentRecord>) {
    const doc = this.documents.get(documentId);
    if (!doc || doc.version !== version) return;
    this.documents.set(documentId, { ...doc, ...patch });
  }
}

