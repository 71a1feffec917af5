import { z } from 'zod';
import type { SqlClient, SqlExecutor, SqlRow } from '../database/database.service';
import type {
  BackendHit,
  IndexRecord,
  QueryResult,
  SearchBackend,
  SearchFilters,
} from './search-backend';

const RecordRow = z.object({
  id: z.string(),
  document_id: z.string(),
  version: z.coerce.number().int(),
  chunk_id: z.string(),
  sequence_index: z.coerce.number().int(),
  title: z.string(),
  source_type: z.enum(['text', 'markdown', 'pdf', 'docx']),
  structural_tag: z.enum(['heading', 'body', 'table']),
  chunk_text: z.string(),
  // pgvector renders as '[0.1,0.2,...]'
  embedding: z.string().transform((v, ctx): number[] => {
    const values = v.replace(/^\[|\]$/g, '').split(',').map(Number);
    if (!values.every((n) => Number.isFinite(n))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'embedding is not a vector literal' });
      return z.NEVER;
    }
    return values;
  }),
});

const HitRow = RecordRow.extend({ score: z.coerce.number() });

const RECORD_COLUMNS = `
  r.id, r.document_id, r.version, r.chunk_id, r.sequence_index, r.title,
  r.source_type, r.structural_tag, r.chunk_text, r.embedding::text as embedding`;

// $2..$4 are the optional filters shared by both queries
const VISIBLE_AND_FILTERED = `
  from public.rag_index_records r
  join public.rag_active_versions a
    on a.document_id = r.document_id and a.version = r.version
  where ($2::text[] is null or r.document_id = any($2))
    and ($3::text[] is null or r.source_type = any($3))
    and ($4::text[] is null or r.structural_tag = any($4))`;

export class PgSearchBackend implements SearchBackend {
  constructor(private readonly db: SqlExecutor) {}

  private toVectorLiteral(arr: readonly number[]) {
    return '[' + arr.map((n) => Number(n).toFixed(8)).join(',') + ']';
  }

  async upsert(records: readonly IndexRecord[]) {
    if (!records.length) return;
    await this.db.transaction(async (tx) => {
      for (const r of records) {
        await tx.query(
          `
          insert into public.rag_index_records
            (id, document_id, version, chunk_id, sequence_index, title,
             source_type, structural_tag, chunk_text, embedding)
          values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10::vector)
          on conflict (id) do update
            set chunk_text = excluded.chunk_text,
                title = excluded.title,
                structural_tag = excluded.structural_tag,
                embedding = excluded.embedding
          `,
          [
            r.id,
            r.documentId,
            r.version,
            r.chunkId,
            r.sequenceIndex,
            r.title,
            r.sourceType,
            r.structuralTag,
            r.text,
            this.toVectorLiteral(r.vector),
          ],
        );
      }
    });
  }

  async activeVersion(documentId: string) {
    const res = await this.db.query(
      `select version from public.rag_active_versions where document_id = $1`,
      [documentId],
    );
    if (!res.rows.length) return null;
    return z.object({ version: z.coerce.number().int() }).parse(res.rows[0]).version;
  }

  async activate(documentId: string, version: number) {
    await this.db.query(
      `
      insert into public.rag_active_versions (document_id, version, activated_at)
      values ($1, $2, now())
      on conflict (document_id) do update
        set version = excluded.version, activated_at = now()
      `,
      [documentId, version],
    );
  }

  async delete(documentId: string, opts: { keepVersion?: number } = {}) {
    const keep = opts.keepVersion;
    if (keep !== undefined) {
      await this.db.query(
        `delete from public.rag_index_records where document_id = $1 and version <> $2`,
        [documentId, keep],
      );
      return;
    }

    await this.db.transaction(async (tx: SqlClient) => {
      await tx.query(`delete from public.rag_active_versions where document_id = $1`, [documentId]);
      await tx.query(`delete from public.rag_index_records where document_id = $1`, [documentId]);
    });
  }

  async query(
    lexicalTerms: readonly string[],
    vector: readonly number[],
    filters: SearchFilters,
    k: number,
  ): Promise<QueryResult> {
    const filterParams = [
      nonEmpty(filters.documentIds),
      nonEmpty(filters.sourceTypes),
      nonEmpty(filters.structuralTags),
    ];

    const lexical = lexicalTerms.length
      ? await this.db.query(
          `
          select ${RECORD_COLUMNS},
                 ts_rank_cd(r.tsv, websearch_to_tsquery('simple', $1)) as score
          ${VISIBLE_AND_FILTERED}
            and r.tsv @@ websearch_to_tsquery('simple', $1)
          order by score desc, r.document_id, r.sequence_index
          limit $5
          `,
          [lexicalTerms.join(' or '), ...filterParams, k],
        )
      : { rows: [] };

    const semantic = await this.db.query(
      `
      select ${RECORD_COLUMNS},
             1 - (r.embedding <=> $1::vector) as score
      ${VISIBLE_AND_FILTERED}
      order by r.embedding <=> $1::vector, r.document_id, r.sequence_index
      limit $5
      `,
      [this.toVectorLiteral(vector), ...filterParams, k],
    );

    return {
      lexical: lexical.rows.map(toHit),
      vector: semantic.rows.map(toHit),
    };
  }

  async visibleRecords(documentId: string) {
    const res = await this.db.query(
      `
      select ${RECORD_COLUMNS}
      ${VISIBLE_AND_FILTERED}
        and r.document_id = $1
      order by r.sequence_index
      `,
      [documentId, null, null, null],
    );
    return res.rows.map((row) => toRecord(RecordRow.parse(row)));
  }
}

function nonEmpty<T>(values: readonly T[] | undefined): readonly T[] | null {
  return values?.length ? values : null;
}

function toRecord(row: z.infer<typeof RecordRow>): IndexRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    version: row.version,
    chunkId: row.chunk_id,
    sequenceIndex: row.sequence_index,
    title: row.title,
    sourceType: row.source_type,
    structuralTag: row.structural_tag,
    text: row.chunk_text,
    vector: row.embedding,
  };
}

function toHit(row: SqlRow): BackendHit {
  const parsed = HitRow.parse(row);
  return { record: toRecord(parsed), score: parsed.score };
}
