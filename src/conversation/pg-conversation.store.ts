import { z } from 'zod';
import type { SqlExecutor } from '../database/database.service';
import type { ConversationStore } from './conversation-store';
import { createTurn, type Conversation } from './conversation.types';

const CitationSchema = z.object({
  marker: z.string(),
  chunkId: z.string(),
  documentId: z.string(),
  title: z.string(),
});

const TurnSchema = z.object({
  id: z.string(),
  question: z.string(),
  resolvedQuestion: z.string(),
  retrievedChunkIds: z.array(z.string()),
  answerText: z.string(),
  citations: z.array(CitationSchema),
  createdAt: z.string(),
});

const ConversationSchema = z.object({
  id: z.string(),
  turns: z.array(TurnSchema),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  historyStartIndex: z.number().int().min(0),
});

/** Conversations as one JSONB document per row. */
export class PgConversationStore implements ConversationStore {
  constructor(private readonly db: SqlExecutor) {}

  async load(conversationId: string): Promise<Conversation | null> {
    const res = await this.db.query(`select body from public.conversations where id = $1`, [
      conversationId,
    ]);
    if (!res.rows.length) return null;

    const { body } = z.object({ body: ConversationSchema }).parse(res.rows[0]);
    return Object.freeze({
      ...body,
      turns: Object.freeze(body.turns.map(createTurn)),
    });
  }

  async save(conversation: Conversation) {
    await this.db.query(
      `
      insert into public.conversations (id, body, updated_at)
      values ($1, $2::jsonb, now())
      on conflict (id) do update set body = excluded.body, updated_at = now()
      `,
      [conversation.id, JSON.stringify(conversation)],
    );
  }
}
