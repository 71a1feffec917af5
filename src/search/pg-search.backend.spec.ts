import { ScriptedSql } from '../../test/fakes';
import { PgSearchBackend } from './pg-search.backend';
import type { IndexRecord } from './search-backend';

const row = {
  id: 'deploy@2#0',
  document_id: 'deploy',
  version: '2',
  chunk_id: 'deploy:0',
  sequence_index: 0,
  title: 'Deploy runbook',
  source_type: 'markdown',
  structural_tag: 'heading',
  chunk_text: 'Deploy with terraform apply',
  embedding: '[0.5,0.25]',
};

const record: IndexRecord = {
  id: 'deploy@2#0',
  documentId: 'deploy',
  version: 2,
  chunkId: 'deploy:0',
  sequenceIndex: 0,
  title: 'Deploy runbook',
  sourceType: 'markdown',
  structuralTag: 'heading',
  text: 'Deploy with terraform apply',
  vector: [0.5, 0.25],
};

describe('PgSearchBackend', () => {
  it('writes records inside one transaction as vector literals', async () => {
    const sql = new ScriptedSql();

    await new PgSearchBackend(sql).upsert([record, { ...record, id: 'deploy@2#1', sequenceIndex: 1 }]);

    expect(sql.transactions).toBe(1);
    expect(sql.executed).toHaveLength(2);
    expect(sql.executed.every((q) => q.inTransaction)).toBe(true);
    expect(sql.executed[0].params).toEqual([
      'deploy@2#0',
      'deploy',
      2,
      'deploy:0',
      0,
      'Deploy runbook',
      'markdown',
      'heading',
      'Deploy with terraform apply',
      '[0.50000000,0.25000000]',
    ]);
  });

  it('skips the transaction for an empty batch', async () => {
    const sql = new ScriptedSql();

    await new PgSearchBackend(sql).upsert([]);

    expect(sql.transactions).toBe(0);
  });

  it('reads the active version', async () => {
    const sql = new ScriptedSql().respondWith([], [{ version: '3' }]);
    const backend = new PgSearchBackend(sql);

    await expect(backend.activeVersion('deploy')).resolves.toBeNull();
    await expect(backend.activeVersion('deploy')).resolves.toBe(3);
  });

  it('runs a lexical and a vector query with shared filters', async () => {
    const sql = new ScriptedSql().respondWith([{ ...row, score: '0.4' }], [{ ...row, score: 0.9 }]);

    const result = await new PgSearchBackend(sql).query(
      ['terraform', 'deploy'],
      [1, 0],
      { sourceTypes: ['markdown'], documentIds: [] },
      20,
    );

    expect(result).toEqual({
      lexical: [{ record, score: 0.4 }],
      vector: [{ record, score: 0.9 }],
    });
    expect(sql.executed[0].text).toContain("websearch_to_tsquery('simple', $1)");
    expect(sql.executed[0].params).toEqual(['terraform or deploy', null, ['markdown'], null, 20]);
    expect(sql.executed[1].text).toContain('1 - (r.embedding <=> $1::vector) as score');
    expect(sql.executed[1].params).toEqual(['[1.00000000,0.00000000]', null, ['markdown'], null, 20]);
  });

  it('skips the lexical query without terms', async () => {
    const sql = new ScriptedSql().respondWith([]);

    const result = await new PgSearchBackend(sql).query([], [1, 0], {}, 5);

    expect(result).toEqual({ lexical: [], vector: [] });
    expect(sql.executed).toHaveLength(1);
  });

  it('refuses rows whose embedding is not a vector', async () => {
    const sql = new ScriptedSql().respondWith([{ ...row, embedding: '[0.5,abc]' }]);

    await expect(new PgSearchBackend(sql).visibleRecords('deploy')).rejects.toThrow(
      'embedding is not a vector literal',
    );
  });

  it('deletes older versions in place and whole documents in a transaction', async () => {
    const sql = new ScriptedSql();
    const backend = new PgSearchBackend(sql);

    await backend.delete('deploy', { keepVersion: 2 });
    await backend.delete('deploy');

    expect(sql.executed.map((q) => [q.text, q.params, q.inTransaction])).toEqual([
      ['delete from public.rag_index_records where document_id = $1 and version <> $2', ['deploy', 2], false],
      ['delete from public.rag_active_versions where document_id = $1', ['deploy'], true],
      ['delete from public.rag_index_records where document_id = $1', ['deploy'], true],
    ]);
  });
});
