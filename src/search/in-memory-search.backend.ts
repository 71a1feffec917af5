import { Injectable } from '@nestjs/common';
import { tokenize } from '../common/text';
import {
  compareHits,
  matchesFilters,
  type BackendHit,
  type IndexRecord,
  type QueryResult,
  type SearchBackend,
  type SearchFilters,
} from './search-backend';

const BM25_K1 = 1.2;
const BM25_B = 0.75;

/**
 * Process-local index. Writes yield between records so concurrent readers
 * interleave with them the way they would against a real server.
 */
@Injectable()
export class InMemorySearchBackend implements SearchBackend {
  private readonly records = new Map<string, IndexRecord>();
  private readonly active = new Map<string, number>();

  async upsert(records: readonly IndexRecord[]) {
    for (const r of records) {
      await tick();
      this.records.set(r.id, { ...r, vector: [...r.vector] });
    }
  }

  async activeVersion(documentId: string) {
    return this.active.get(documentId) ?? null;
  }

  async activate(documentId: string, version: number) {
    await tick();
    this.active.set(documentId, version);
  }

  async delete(documentId: string, opts: { keepVersion?: number } = {}) {
    const keep = opts.keepVersion;
    if (keep === undefined) this.active.delete(documentId);

    for (const [id, r] of [...this.records]) {
      if (r.documentId !== documentId || r.version === keep) continue;
      await tick();
      this.records.delete(id);
    }
  }

  async query(
    lexicalTerms: readonly string[],
    vector: readonly number[],
    filters: SearchFilters,
    k: number,
  ): Promise<QueryResult> {
    await tick();
    const visible = [...this.records.values()].filter(
      (r) => this.active.get(r.documentId) === r.version && matchesFilters(r, filters),
    );

    return {
      lexical: top(this.lexicalScores(visible, lexicalTerms), k),
      vector: top(
        visible.map((record) => ({ record, score: cosine(vector, record.vector) })),
        k,
      ),
    };
  }

  async visibleRecords(documentId: string) {
    const version = this.active.get(documentId);
    return [...this.records.values()]
      .filter((r) => r.documentId === documentId && r.version === version)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }

  private lexicalScores(records: IndexRecord[], terms: readonly string[]): BackendHit[] {
    if (!terms.length || !records.length) return [];

    const docs = records.map((record) => ({ record, tokens: tokenize(record.text) }));
    const avgLen = docs.reduce((sum, d) => sum + d.tokens.length, 0) / docs.length || 1;

    const df = new Map<string, number>();
    for (const term of terms) {
      df.set(term, docs.filter((d) => d.tokens.includes(term)).length);
    }

    const hits: BackendHit[] = [];
    for (const { record, tokens } of docs) {
      let score = 0;
      for (const term of terms) {
        const tf = tokens.filter((t) => t === term).length;
        if (!tf) continue;
        const n = df.get(term) ?? 0;
        const idf = Math.log(1 + (docs.length - n + 0.5) / (n + 0.5));
        score +=
          (idf * tf * (BM25_K1 + 1)) /
          (tf + BM25_K1 * (1 - BM25_B + (BM25_B * tokens.length) / avgLen));
      }
      if (score > 0) hits.push({ record, score });
    }
    return hits;
  }
}

function top(hits: BackendHit[], k: number) {
  return hits
    .sort((a, b) =>
      compareHits(
        { score: a.score, documentId: a.record.documentId, sequenceIndex: a.record.sequenceIndex },
        { score: b.score, documentId: b.record.documentId, sequenceIndex: b.record.sequenceIndex },
      ),
    )
    .slice(0, k);
}

export function cosine(a: readonly number[], b: readonly number[]) {
  if (a.length !== b.length || !a.length) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  return na && nb ? dot / Math.sqrt(na * nb) : 0;
}

function tick() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
