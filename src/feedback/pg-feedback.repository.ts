import { z } from 'zod';
import type { SqlExecutor } from '../database/database.service';
import type { FeedbackRepository } from './feedback.repository';
import { FEEDBACK_KINDS, type Feedback } from './feedback.types';

const FeedbackRow = z.object({
  id: z.string(),
  conversation_id: z.string(),
  answer_id: z.string(),
  author: z.string(),
  kind: z.enum(FEEDBACK_KINDS),
  comment: z.string().nullable(),
  reaction: z.string().nullable(),
  created_at: z.union([z.date(), z.string()]),
});

export class PgFeedbackRepository implements FeedbackRepository {
  constructor(private readonly db: SqlExecutor) {}

  async append(f: Feedback) {
    await this.db.query(
      `
      insert into public.feedback
        (id, conversation_id, answer_id, author, kind, comment, reaction, created_at)
      values ($1,$2,$3,$4,$5,$6,$7,$8)
      `,
      [
        f.id,
        f.turn.conversationId,
        f.turn.answerId,
        f.author,
        f.kind,
        f.comment ?? null,
        f.reaction ?? null,
        f.createdAt,
      ],
    );
  }

  async history(to?: Date): Promise<Feedback[]> {
    const res = await this.db.query(
      `
      select id, conversation_id, answer_id, author, kind, comment, reaction, created_at
      from public.feedback
      where ($1::timestamptz is null or created_at <= $1)
      order by seq
      `,
      [to ? to.toISOString() : null],
    );

    return res.rows.map((raw) => {
      const row = FeedbackRow.parse(raw);
      return Object.freeze({
        id: row.id,
        turn: Object.freeze({ conversationId: row.conversation_id, answerId: row.answer_id }),
        author: row.author,
        kind: row.kind,
        ...(row.comment !== null ? { comment: row.comment } : {}),
        ...(row.reaction !== null ? { reaction: row.reaction } : {}),
        createdAt: new Date(row.created_at).toISOString(),
      });
    });
  }
}
